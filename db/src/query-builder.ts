import type { TransactionFilters } from '@finance-tracker/core';

export type FilterPredicate =
  | { kind: 'category'; name: string }
  | { kind: 'dateFrom'; date: string }
  | { kind: 'dateTo'; date: string };

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

export const TRANSACTION_SELECT = `
  SELECT t.id, t.description, t.amount, t.date, c.name AS category
  FROM transactions t
  LEFT JOIN categories c ON t.category_id = c.id
`;

function present(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * Turn the filter set into typed predicates. Blank values are treated as
 * absent. Dates compare as strings against the stored YYYY-MM-DD text.
 */
export function predicatesFromFilters(filters?: TransactionFilters | null): FilterPredicate[] {
  if (!filters) return [];

  const predicates: FilterPredicate[] = [];
  if (present(filters.category)) {
    predicates.push({ kind: 'category', name: filters.category });
  }
  if (present(filters.startDate)) {
    predicates.push({ kind: 'dateFrom', date: filters.startDate.trim() });
  }
  if (present(filters.endDate)) {
    predicates.push({ kind: 'dateTo', date: filters.endDate.trim() });
  }
  return predicates;
}

export function compilePredicate(predicate: FilterPredicate): CompiledQuery {
  switch (predicate.kind) {
    case 'category':
      return { sql: 'c.name = ?', params: [predicate.name] };
    case 'dateFrom':
      return { sql: 't.date >= ?', params: [predicate.date] };
    case 'dateTo':
      return { sql: 't.date <= ?', params: [predicate.date] };
  }
}

/** Positive row cap, or null for none (0 means "no limit"). */
export function normalizeLimit(limit?: number | null): number | null {
  if (limit === null || limit === undefined || !Number.isFinite(limit)) return null;
  const whole = Math.floor(limit);
  return whole > 0 ? whole : null;
}

/**
 * Transactions joined to their category name, newest date first. Values are
 * always bound as parameters.
 */
export function buildTransactionQuery(filters?: TransactionFilters | null, limit?: number | null): CompiledQuery {
  const compiled = predicatesFromFilters(filters).map(compilePredicate);
  const params: unknown[] = compiled.flatMap(p => p.params);

  let sql = TRANSACTION_SELECT;
  if (compiled.length > 0) {
    sql += ` WHERE ${compiled.map(p => p.sql).join(' AND ')}`;
  }
  sql += ' ORDER BY t.date DESC';

  const cap = normalizeLimit(limit);
  if (cap !== null) {
    sql += ' LIMIT ?';
    params.push(cap);
  }

  return { sql, params };
}
