export { SQLiteDriver, RunResult, DriverFactory } from './driver';
export { BetterSqlite3Driver, openBetterSqlite3 } from './drivers/better-sqlite3';
export { FinanceDatabase, FinanceDatabaseOptions, SCHEMA_SQL } from './database';
export {
  FilterPredicate,
  CompiledQuery,
  TRANSACTION_SELECT,
  predicatesFromFilters,
  compilePredicate,
  normalizeLimit,
  buildTransactionQuery,
} from './query-builder';
export * from './row-types';
export { FinanceTracker, StartOptions, startFinanceTracker } from './app';
