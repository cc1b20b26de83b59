/**
 * Synchronous SQLite driver interface. The gateway only talks to this, so a
 * test can hand it a driver that fails on demand.
 */
export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

export interface SQLiteDriver {
  run(sql: string, params?: unknown[]): RunResult;
  get<T>(sql: string, params?: unknown[]): T | undefined;
  all<T>(sql: string, params?: unknown[]): T[];
  exec(sql: string): void;
  transaction<T>(fn: () => T): T;
  close(): void;
}

/** Opens a fresh connection to the store at `path`. */
export type DriverFactory = (path: string) => SQLiteDriver;
