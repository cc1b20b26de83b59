import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_CATEGORIES = [
  'Salary', 'Rent', 'Food', 'Transport', 'Entertainment', 'Utilities', 'Other',
] as const;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export interface AppConfig {
  appName: string;
  appVersion: string;
  databasePath: string;
  logLevel: (typeof LOG_LEVELS)[number];
  currency: string;
  defaultCategories: readonly string[];
}

const envSchema = z.object({
  FINANCE_TRACKER_DB: z.string().trim().min(1).optional(),
  FINANCE_TRACKER_CURRENCY: z
    .string()
    .trim()
    .regex(/^[A-Z]{3}$/, 'must be a three-letter currency code')
    .optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  NODE_ENV: z.string().optional(),
});

type Env = Record<string, string | undefined>;

/**
 * Read configuration from the environment. Unset or empty variables fall back
 * to their defaults; invalid ones raise a ConfigError naming every bad key.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): Readonly<AppConfig> {
  // Empty strings behave like unset variables
  const present: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const keys = parsed.error.issues.map(issue => String(issue.path[0]));
    const details = parsed.error.issues.map(issue => `${String(issue.path[0])}: ${issue.message}`);
    throw new ConfigError(keys, `Invalid configuration: ${details.join('; ')}`);
  }

  const vars = parsed.data;
  const config: AppConfig = {
    appName: 'Finance Tracker',
    appVersion: '1.0.0',
    databasePath: path.resolve(cwd, vars.FINANCE_TRACKER_DB ?? path.join('data', 'finance.db')),
    logLevel: vars.LOG_LEVEL ?? (vars.NODE_ENV === 'test' ? 'silent' : 'info'),
    currency: vars.FINANCE_TRACKER_CURRENCY ?? 'EUR',
    defaultCategories: DEFAULT_CATEGORIES,
  };
  return Object.freeze(config);
}
