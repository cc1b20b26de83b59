import { QueryResult } from './types';

export function ok<T>(value: T): QueryResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: string): QueryResult<T> {
  return { ok: false, error };
}

/**
 * Degrade a failed read to a fallback value, e.g. an empty list for display.
 */
export function unwrapOr<T>(result: QueryResult<T>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
