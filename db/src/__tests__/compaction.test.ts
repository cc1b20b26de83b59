import { StoredTransaction } from '@finance-tracker/core'
import { FinanceDatabase } from '../database'
import { SQLiteDriver } from '../driver'
import { openBetterSqlite3 } from '../drivers/better-sqlite3'
import { makeDatabase, makeTempDir, removeDir } from './helpers'

function all(db: FinanceDatabase): StoredTransaction[] {
  const result = db.fetchTransactions()
  if (!result.ok) throw new Error(result.error)
  return result.value
}

function seed(db: FinanceDatabase, count: number): number[] {
  const ids: number[] = []
  for (let i = 1; i <= count; i++) {
    const id = db.addTransaction({
      description: `T${i}`,
      amount: i * 1.5,
      date: `2025-12-0${i}`,
      category: i % 2 === 0 ? 'Even' : 'Odd',
    })
    if (id === null) throw new Error('insert failed')
    ids.push(id)
  }
  return ids
}

/**
 * Real driver that throws on one statement, to break the rebuild halfway.
 */
function failingOn(pattern: RegExp) {
  return (dbPath: string): SQLiteDriver => {
    const inner = openBetterSqlite3(dbPath)
    return {
      run: (sql, params) => inner.run(sql, params),
      get<T>(sql: string, params?: unknown[]) {
        return inner.get<T>(sql, params)
      },
      all<T>(sql: string, params?: unknown[]) {
        return inner.all<T>(sql, params)
      },
      exec: sql => {
        if (pattern.test(sql)) throw new Error(`injected failure: ${sql}`)
        inner.exec(sql)
      },
      transaction<T>(fn: () => T) {
        return inner.transaction(fn)
      },
      close: () => inner.close(),
    }
  }
}

describe('compactTransactionIds', () => {
  let dir: string
  let db: FinanceDatabase

  beforeEach(() => {
    dir = makeTempDir()
    db = makeDatabase(dir)
  })

  afterEach(() => {
    removeDir(dir)
  })

  it('should renumber sparse ids densely in ascending order', () => {
    seed(db, 7)
    db.deleteTransaction(2)
    db.deleteTransaction(5)

    const result = db.compactTransactionIds()

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(Array.from(result.value.entries())).toEqual([
      [1, 1],
      [3, 2],
      [4, 3],
      [6, 4],
      [7, 5],
    ])
  })

  it('should keep every non-id field of every row', () => {
    seed(db, 6)
    db.deleteTransaction(1)
    const before = all(db)

    const result = db.compactTransactionIds()
    if (!result.ok) throw new Error(result.error)

    expect(result.value.size).toBe(5)
    const newIds = Array.from(result.value.values())
    expect(new Set(newIds).size).toBe(5)
    expect(Math.min(...newIds)).toBeGreaterThanOrEqual(1)

    for (const row of before) {
      const newId = result.value.get(row.id)
      if (newId === undefined) throw new Error(`no mapping for ${row.id}`)
      const after = db.fetchTransactionById(newId)
      expect(after).toEqual({ ok: true, value: { ...row, id: newId } })
    }
  })

  it('should continue numbering after the compacted rows', () => {
    seed(db, 3)
    db.deleteTransaction(1)
    db.compactTransactionIds()

    const next = db.addTransaction({ description: 'Next', amount: 1, date: '2025-12-09', category: 'Odd' })

    expect(next).toBe(3)
  })

  it('should keep orphaned category references', () => {
    const driver = openBetterSqlite3(db.path)
    try {
      driver.run(
        'INSERT INTO transactions (description, amount, date, category_id) VALUES (?, ?, ?, ?)',
        ['Orphan', -1, '2025-12-01', 404]
      )
    } finally {
      driver.close()
    }

    const result = db.compactTransactionIds()

    expect(result.ok).toBe(true)
    expect(all(db)).toEqual([{ id: 1, description: 'Orphan', amount: -1, date: '2025-12-01', category: null }])
  })

  it('should return an empty mapping for an empty store', () => {
    const result = db.compactTransactionIds()

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.size).toBe(0)
    }
  })

  it('should leave the store exactly as it was when the rebuild fails', () => {
    seed(db, 4)
    db.deleteTransaction(2)
    const before = all(db)

    const broken = makeDatabase(dir, 'test.db', failingOn(/^ALTER TABLE/))
    const result = broken.compactTransactionIds()

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toContain('injected failure')
    }
    expect(all(db)).toEqual(before)
    expect(all(db).map(t => t.id)).toEqual([4, 3, 1])

    const driver = openBetterSqlite3(db.path)
    try {
      const shadow = driver.get<{ name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'transactions_compact'"
      )
      expect(shadow).toBeUndefined()
    } finally {
      driver.close()
    }
  })
})
