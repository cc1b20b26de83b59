import { safeCreateTransaction } from '../transaction';
import { StoredTransaction, Transaction } from '../types';

export const CSV_HEADER = ['id', 'description', 'amount', 'date', 'category'] as const;

export interface RejectedRow {
  line: number; // 1-based record number, the header is record 1
  reason: string;
}

export interface ParseResult {
  transactions: Transaction[];
  rejected: RejectedRow[];
}

type CSVRow = Record<string, string>;

// ==================== Column Aliases ====================
// Header names are matched case-sensitively; the first alias present wins.

const DESCRIPTION_COLUMNS = ['description', 'desc'];
const DATE_COLUMNS = ['date', 'datetime'];
const CATEGORY_COLUMNS = ['category', 'cat'];
const AMOUNT_COLUMNS = ['amount'];

/**
 * Split CSV content into records of raw cell values. Quoted cells may contain
 * the delimiter, escaped quotes ("") and line breaks.
 */
function parseCSVRecords(content: string, delimiter = ','): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          // Escaped quote
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === delimiter) {
      record.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') i++;
      record.push(current);
      records.push(record);
      record = [];
      current = '';
    } else {
      current += char;
    }
  }

  if (current.length > 0 || record.length > 0) {
    record.push(current);
    records.push(record);
  }

  return records;
}

function findColumn(headers: string[], aliases: string[]): string | null {
  return aliases.find(alias => headers.includes(alias)) ?? null;
}

function isBlankRecord(values: string[]): boolean {
  return values.every(v => v.trim() === '');
}

function parseAmount(amountStr: string | undefined): number {
  if (amountStr === undefined) return 0;
  const trimmed = amountStr.trim();
  if (trimmed === '') return 0;
  const amount = Number(trimmed);
  return Number.isFinite(amount) ? amount : 0;
}

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Parse exported (or hand-written) transaction CSV. Every row goes through the
 * same validation as manual entry; rows that fail are reported in `rejected`.
 * An `id` column is ignored.
 */
export function parseTransactionsCsv(content: string): ParseResult {
  const records = parseCSVRecords(content.replace(/^\uFEFF/, ''));
  if (records.length === 0) {
    return { transactions: [], rejected: [] };
  }

  const headers = records[0];
  const descCol = findColumn(headers, DESCRIPTION_COLUMNS);
  const dateCol = findColumn(headers, DATE_COLUMNS);
  const categoryCol = findColumn(headers, CATEGORY_COLUMNS);
  const amountCol = findColumn(headers, AMOUNT_COLUMNS);

  const transactions: Transaction[] = [];
  const rejected: RejectedRow[] = [];

  for (let i = 1; i < records.length; i++) {
    const values = records[i];
    if (isBlankRecord(values)) continue;

    const row: CSVRow = {};
    headers.forEach((header, idx) => {
      row[header] = values[idx] ?? '';
    });

    const result = safeCreateTransaction({
      description: descCol ? row[descCol] : '',
      amount: parseAmount(amountCol ? row[amountCol] : undefined),
      date: dateCol ? row[dateCol] : '',
      category: categoryCol ? row[categoryCol] : '',
    });

    if (result.success) {
      transactions.push(result.transaction);
    } else {
      rejected.push({ line: i + 1, reason: result.error.message });
    }
  }

  return { transactions, rejected };
}

export function serializeTransactionsCsv(transactions: StoredTransaction[]): string {
  const lines = [CSV_HEADER.join(',')];

  for (const t of transactions) {
    lines.push([
      String(t.id),
      escapeField(t.description),
      String(t.amount),
      escapeField(t.date),
      escapeField(t.category ?? ''),
    ].join(','));
  }

  return lines.join('\n') + '\n';
}

export { parseCSVRecords, parseAmount };
