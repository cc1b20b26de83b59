// Types
export * from './types';

// Errors
export { TransactionValidationError, ConfigError } from './errors';

// Utilities
export { ok, fail, unwrapOr, errorMessage } from './utils';

// Transaction model
export {
  DATE_FORMAT,
  isIsoDate,
  SafeTransactionResult,
  safeCreateTransaction,
  createTransaction,
  toTransactionRecord,
} from './transaction';

// CSV interchange
export {
  CSV_HEADER,
  RejectedRow,
  ParseResult,
  parseTransactionsCsv,
  serializeTransactionsCsv,
  parseCSVRecords,
  parseAmount,
} from './parsers/csv-parser';

export {
  // Report Engine
  UNCATEGORIZED,
  CategoryTotal,
  MonthlyTotal,
  TransactionSummary,
  summarizeByCategory,
  summarizeByMonth,
  summarizeTransactions,
  formatSummary,
  ReportEngine,
} from './engines/report-engine';

// Runtime plumbing
export { AppConfig, DEFAULT_CATEGORIES, loadConfig } from './config';
export { Logger, LoggerOptions, createLogger, createSilentLogger } from './logger';
export { TaskHandle, Task, BackgroundTaskRunner } from './task-runner';
