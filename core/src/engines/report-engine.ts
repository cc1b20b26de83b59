import { StoredTransaction } from '../types';

export const UNCATEGORIZED = 'Uncategorized';

export interface CategoryTotal {
  category: string;
  total: number;
  count: number;
}

export interface MonthlyTotal {
  month: string; // YYYY-MM
  income: number;
  expenses: number; // magnitude of negative amounts
  net: number;
}

export interface TransactionSummary {
  count: number;
  total: number;
  average: number;
  income: number;
  expenses: number;
  largestExpense: StoredTransaction | null;
}

type ReportTransaction = Pick<StoredTransaction, 'amount' | 'date' | 'category'>;

/**
 * Sum amounts per category, largest absolute total first.
 */
export function summarizeByCategory(transactions: ReportTransaction[]): CategoryTotal[] {
  const totals = new Map<string, CategoryTotal>();

  for (const t of transactions) {
    const category = t.category ?? UNCATEGORIZED;
    const entry = totals.get(category) ?? { category, total: 0, count: 0 };
    entry.total += t.amount;
    entry.count++;
    totals.set(category, entry);
  }

  return Array.from(totals.values()).sort(
    (a, b) => Math.abs(b.total) - Math.abs(a.total) || a.category.localeCompare(b.category)
  );
}

/**
 * Income, expenses and net per calendar month, oldest month first.
 */
export function summarizeByMonth(transactions: ReportTransaction[]): MonthlyTotal[] {
  const months = new Map<string, MonthlyTotal>();

  for (const t of transactions) {
    const month = t.date.slice(0, 7);
    const entry = months.get(month) ?? { month, income: 0, expenses: 0, net: 0 };
    if (t.amount >= 0) {
      entry.income += t.amount;
    } else {
      entry.expenses += -t.amount;
    }
    entry.net += t.amount;
    months.set(month, entry);
  }

  return Array.from(months.values()).sort((a, b) => a.month.localeCompare(b.month));
}

export function summarizeTransactions(transactions: StoredTransaction[]): TransactionSummary {
  if (transactions.length === 0) {
    return { count: 0, total: 0, average: 0, income: 0, expenses: 0, largestExpense: null };
  }

  let total = 0;
  let income = 0;
  let expenses = 0;
  let largestExpense: StoredTransaction | null = null;

  for (const t of transactions) {
    total += t.amount;
    if (t.amount >= 0) {
      income += t.amount;
    } else {
      expenses += -t.amount;
      if (!largestExpense || t.amount < largestExpense.amount) {
        largestExpense = t;
      }
    }
  }

  return {
    count: transactions.length,
    total,
    average: total / transactions.length,
    income,
    expenses,
    largestExpense,
  };
}

export function formatSummary(summary: TransactionSummary, currency: string): string {
  if (summary.count === 0) {
    return 'No transactions';
  }
  return [
    `Total: ${summary.total.toFixed(2)} ${currency}`,
    `Count: ${summary.count}`,
    `Average: ${summary.average.toFixed(2)} ${currency}`,
  ].join(' | ');
}

// Class-based API over a transaction source
export class ReportEngine {
  private getTransactions: () => StoredTransaction[];

  constructor(dataSource: { getTransactions: () => StoredTransaction[] }) {
    this.getTransactions = dataSource.getTransactions;
  }

  byCategory(): CategoryTotal[] {
    return summarizeByCategory(this.getTransactions());
  }

  byMonth(): MonthlyTotal[] {
    return summarizeByMonth(this.getTransactions());
  }

  summary(): TransactionSummary {
    return summarizeTransactions(this.getTransactions());
  }
}
