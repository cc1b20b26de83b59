// Core data types for the finance tracker

export type TransactionField = 'id' | 'description' | 'amount' | 'date' | 'category';

/**
 * A validated transaction. Only `createTransaction` produces values of this
 * type; `id` stays null until the gateway has stored it.
 */
export interface Transaction {
  id: number | null;
  description: string;
  amount: number; // negative = expense, positive = income
  date: string; // YYYY-MM-DD
  category: string;
}

/**
 * Raw input as it arrives from a form or an import row, before validation.
 */
export interface TransactionInput {
  id?: number | null;
  description?: string | null;
  amount?: number | string | null;
  date?: string | null;
  category?: string | null;
}

/**
 * Record accepted by the gateway's insert. Looser than `Transaction`:
 * the gateway coerces the amount and resolves the category itself.
 */
export interface NewTransactionRecord {
  description?: string | null;
  amount?: number | string | null;
  date: string;
  category?: string | null;
}

export interface TransactionRecord extends NewTransactionRecord {
  id?: number | null;
}

/**
 * A transaction as read back from the store. `category` is null when the
 * row has no category or references one that no longer exists.
 */
export interface StoredTransaction {
  id: number;
  description: string;
  amount: number;
  date: string;
  category: string | null;
}

export interface Category {
  id: number;
  name: string;
}

export interface TransactionFilters {
  category?: string | null;
  startDate?: string | null; // inclusive, YYYY-MM-DD
  endDate?: string | null; // inclusive, YYYY-MM-DD
}

/**
 * Outcome of a read against the store. Reads never throw; a failed query is
 * reported here and the caller decides whether to show an empty list.
 */
export type QueryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };
