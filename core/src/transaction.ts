import { z } from 'zod';
import { isValid, parse } from 'date-fns';
import { TransactionValidationError } from './errors';
import { Transaction, TransactionField, TransactionInput, TransactionRecord } from './types';

export const DATE_FORMAT = 'yyyy-MM-dd';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True for a real calendar date written as YYYY-MM-DD (2025-02-30 is rejected).
 */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  return isValid(parse(value, DATE_FORMAT, new Date()));
}

function toAmount(value: unknown): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? NaN : Number(trimmed);
  }
  return value ?? NaN;
}

const requiredText = (message: string) =>
  z.preprocess(v => (typeof v === 'string' ? v.trim() : ''), z.string().min(1, message));

const transactionSchema = z.object({
  id: z.number().int().positive('Id must be a positive integer').nullable().optional(),
  description: requiredText('Description cannot be empty'),
  amount: z.preprocess(
    toAmount,
    z
      .number({ invalid_type_error: 'Amount must be a number' })
      .finite('Amount must be a finite number')
      .refine(n => n !== 0, 'Amount cannot be zero'),
  ),
  date: z.preprocess(
    v => (typeof v === 'string' ? v.trim() : ''),
    z.string().refine(isIsoDate, v => ({ message: `Invalid date format: ${v}. Expected YYYY-MM-DD` })),
  ),
  category: requiredText('Category cannot be empty'),
});

const FIELDS: readonly TransactionField[] = ['id', 'description', 'amount', 'date', 'category'];

function isTransactionField(value: unknown): value is TransactionField {
  return FIELDS.some(f => f === value);
}

export type SafeTransactionResult =
  | { success: true; transaction: Transaction }
  | { success: false; error: TransactionValidationError };

export function safeCreateTransaction(input: TransactionInput): SafeTransactionResult {
  const parsed = transactionSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = isTransactionField(issue.path[0]) ? issue.path[0] : 'description';
    return { success: false, error: new TransactionValidationError(field, issue.message) };
  }

  const { id, description, amount, date, category } = parsed.data;
  return {
    success: true,
    transaction: { id: id ?? null, description, amount, date, category },
  };
}

/**
 * Build a validated transaction from user input.
 * @throws TransactionValidationError naming the first invalid field
 */
export function createTransaction(input: TransactionInput): Transaction {
  const result = safeCreateTransaction(input);
  if (!result.success) {
    throw result.error;
  }
  return result.transaction;
}

export function toTransactionRecord(transaction: Transaction): TransactionRecord {
  return {
    id: transaction.id,
    description: transaction.description,
    amount: transaction.amount,
    date: transaction.date,
    category: transaction.category,
  };
}
