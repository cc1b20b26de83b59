import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { createSilentLogger } from '@finance-tracker/core'
import { FinanceDatabase } from '../database'
import { DriverFactory } from '../driver'

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'finance-tracker-'))
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}

export function makeDatabase(dir: string, name = 'test.db', openDriver?: DriverFactory): FinanceDatabase {
  const db = new FinanceDatabase({
    path: path.join(dir, name),
    logger: createSilentLogger(),
    openDriver,
  })
  db.ensureDatabase()
  return db
}
