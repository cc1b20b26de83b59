import pino, { Logger, LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/**
 * Root logger for the application. Components receive it through their
 * constructor and derive a child per component.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'finance-tracker',
    level: options.level ?? 'info',
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
