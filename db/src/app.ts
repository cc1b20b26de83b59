import {
  AppConfig,
  BackgroundTaskRunner,
  Logger,
  createLogger,
  loadConfig,
} from '@finance-tracker/core';
import { FinanceDatabase } from './database';
import { DriverFactory } from './driver';

export interface FinanceTracker {
  config: Readonly<AppConfig>;
  logger: Logger;
  database: FinanceDatabase;
  tasks: BackgroundTaskRunner;
}

export interface StartOptions {
  config?: Readonly<AppConfig>;
  logger?: Logger;
  openDriver?: DriverFactory;
}

/**
 * Application startup: load config, create the store if needed and make
 * sure the default categories exist. A failure to create the store is fatal.
 */
export function startFinanceTracker(options: StartOptions = {}): FinanceTracker {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger({ level: config.logLevel, name: 'finance-tracker' });

  const database = new FinanceDatabase({
    path: config.databasePath,
    logger,
    openDriver: options.openDriver,
  });
  database.ensureDatabase();

  const added = database.seedDefaultCategories(config.defaultCategories);
  if (added.length > 0) {
    logger.info({ categories: added }, 'Added default categories');
  }

  logger.info({ app: config.appName, version: config.appVersion, db: config.databasePath }, 'Finance tracker ready');

  return {
    config,
    logger,
    database,
    tasks: new BackgroundTaskRunner(logger),
  };
}
