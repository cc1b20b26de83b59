import * as fs from 'fs';
import * as path from 'path';
import {
  Category,
  Logger,
  NewTransactionRecord,
  QueryResult,
  StoredTransaction,
  TransactionFilters,
  TransactionRecord,
  errorMessage,
  fail,
  ok,
  parseTransactionsCsv,
  serializeTransactionsCsv,
  toTransactionRecord,
} from '@finance-tracker/core';
import { DriverFactory, SQLiteDriver } from './driver';
import { openBetterSqlite3 } from './drivers/better-sqlite3';
import { TRANSACTION_SELECT, buildTransactionQuery } from './query-builder';
import { CategoryRow, CountRow, TransactionRow, TransactionWithCategoryRow } from './row-types';

const SHADOW_TABLE = 'transactions_compact';

function transactionsTableSql(name: string): string {
  return `
    CREATE TABLE IF NOT EXISTS ${name} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      description TEXT,
      amount REAL NOT NULL,
      date TEXT NOT NULL,
      category_id INTEGER,
      FOREIGN KEY (category_id) REFERENCES categories(id)
    );
  `;
}

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE
  );
  ${transactionsTableSql('transactions')}
`;

export interface FinanceDatabaseOptions {
  path: string;
  logger: Logger;
  openDriver?: DriverFactory;
}

/**
 * Amount as stored: missing means 0, anything that is not a finite number
 * is refused (null).
 */
function coerceAmount(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (trimmed === '') return 0;
  const amount = Number(trimmed);
  return Number.isFinite(amount) ? amount : null;
}

/**
 * Persistence gateway for the finance tracker.
 *
 * Every operation opens its own connection and closes it before returning;
 * nothing spans two calls. The API is synchronous, so UI code should go
 * through a BackgroundTaskRunner rather than call it directly.
 *
 * Reads return a QueryResult and never throw. Writes report failure as
 * null/false after logging. Only ensureDatabase rethrows.
 */
export class FinanceDatabase {
  readonly path: string;
  protected log: Logger;
  private openDriver: DriverFactory;

  constructor(options: FinanceDatabaseOptions) {
    this.path = options.path;
    this.log = options.logger.child({ component: 'database' });
    this.openDriver = options.openDriver ?? openBetterSqlite3;
  }

  private withConnection<T>(fn: (driver: SQLiteDriver) => T): T {
    const driver = this.openDriver(this.path);
    try {
      return fn(driver);
    } finally {
      driver.close();
    }
  }

  private mapTransaction(row: TransactionWithCategoryRow): StoredTransaction {
    return {
      id: row.id,
      description: row.description ?? '',
      amount: row.amount,
      date: row.date,
      category: row.category,
    };
  }

  /**
   * Look a category up by exact name, creating it on first use.
   * Blank names resolve to no category.
   */
  private internCategory(driver: SQLiteDriver, name: string | null | undefined): number | null {
    const trimmed = name?.trim();
    if (!trimmed) return null;

    const existing = driver.get<{ id: number }>('SELECT id FROM categories WHERE name = ?', [trimmed]);
    if (existing) return existing.id;

    return driver.run('INSERT INTO categories (name) VALUES (?)', [trimmed]).lastInsertRowid;
  }

  // ==================== Schema ====================

  /**
   * Create parent directories, then the schema if the file does not exist yet.
   * An existing file is left untouched.
   */
  ensureDatabase(): void {
    this.log.debug({ path: this.path }, 'Ensuring database exists');
    try {
      fs.mkdirSync(path.dirname(this.path), { recursive: true });

      if (fs.existsSync(this.path)) {
        this.log.debug({ path: this.path }, 'Database file already exists');
        return;
      }

      this.withConnection(driver => driver.exec(SCHEMA_SQL));
      this.log.info({ path: this.path }, 'Created and initialized database');
    } catch (err) {
      this.log.error({ err, path: this.path }, 'Failed to create/initialize database');
      throw err;
    }
  }

  // ==================== Categories ====================

  fetchCategories(): QueryResult<Category[]> {
    try {
      const rows = this.withConnection(driver =>
        driver.all<CategoryRow>('SELECT id, name FROM categories ORDER BY name ASC')
      );
      return ok(rows.map(r => ({ id: r.id, name: r.name })));
    } catch (err) {
      this.log.error({ err }, 'Failed to fetch categories');
      return fail(errorMessage(err));
    }
  }

  /**
   * Resolve a category name to its id, inserting it if needed. Two writers
   * racing on the same new name are only kept apart by the UNIQUE
   * constraint, so the loser gets null.
   */
  ensureCategory(name: string | null | undefined): number | null {
    if (!name?.trim()) return null;
    try {
      return this.withConnection(driver => this.internCategory(driver, name));
    } catch (err) {
      this.log.error({ err, name }, 'Failed to ensure category');
      return null;
    }
  }

  /**
   * Create any of `names` that do not exist yet. Returns the names created.
   */
  seedDefaultCategories(names: readonly string[]): string[] {
    try {
      return this.withConnection(driver =>
        driver.transaction(() => {
          const added: string[] = [];
          for (const name of names) {
            const trimmed = name.trim();
            if (!trimmed) continue;
            const existing = driver.get<{ id: number }>('SELECT id FROM categories WHERE name = ?', [trimmed]);
            if (!existing) {
              driver.run('INSERT INTO categories (name) VALUES (?)', [trimmed]);
              added.push(trimmed);
            }
          }
          return added;
        })
      );
    } catch (err) {
      this.log.error({ err }, 'Failed to seed default categories');
      return [];
    }
  }

  // ==================== Transactions ====================

  fetchTransactionById(id: number): QueryResult<StoredTransaction | null> {
    try {
      const row = this.withConnection(driver =>
        driver.get<TransactionWithCategoryRow>(`${TRANSACTION_SELECT} WHERE t.id = ?`, [id])
      );
      return ok(row ? this.mapTransaction(row) : null);
    } catch (err) {
      this.log.error({ err, id }, 'Failed to fetch transaction');
      return fail(errorMessage(err));
    }
  }

  /**
   * Transactions newest date first. Rows sharing a date come back in storage
   * order, which compaction may change.
   * @param limit - row cap; 0 or absent means no cap
   */
  fetchTransactions(filters?: TransactionFilters | null, limit?: number | null): QueryResult<StoredTransaction[]> {
    try {
      const query = buildTransactionQuery(filters, limit);
      const rows = this.withConnection(driver => driver.all<TransactionWithCategoryRow>(query.sql, query.params));
      return ok(rows.map(row => this.mapTransaction(row)));
    } catch (err) {
      this.log.error({ err, filters, limit }, 'Failed to fetch transactions');
      return fail(errorMessage(err));
    }
  }

  countTransactions(): QueryResult<number> {
    try {
      const row = this.withConnection(driver =>
        driver.get<CountRow>('SELECT COUNT(*) AS count FROM transactions')
      );
      return ok(row?.count ?? 0);
    } catch (err) {
      this.log.error({ err }, 'Failed to count transactions');
      return fail(errorMessage(err));
    }
  }

  /**
   * Insert a transaction and return its new id, or null on failure.
   * A missing amount is stored as 0; no other validation happens here.
   */
  addTransaction(record: NewTransactionRecord): number | null {
    const amount = coerceAmount(record.amount);
    if (amount === null) {
      this.log.error({ amount: record.amount }, 'Refusing transaction with non-numeric amount');
      return null;
    }

    try {
      const id = this.withConnection(driver => {
        const categoryId = this.internCategory(driver, record.category);
        return driver.run(
          'INSERT INTO transactions (description, amount, date, category_id) VALUES (?, ?, ?, ?)',
          [record.description ?? null, amount, record.date, categoryId]
        ).lastInsertRowid;
      });
      this.log.debug({ id }, 'Inserted transaction');
      return id;
    } catch (err) {
      this.log.error({ err }, 'Failed to add transaction');
      return null;
    }
  }

  /**
   * Overwrite every field of the row with `record.id`. False when the id is
   * missing, matches nothing, or the write fails.
   */
  updateTransaction(record: TransactionRecord): boolean {
    if (record.id === null || record.id === undefined) {
      this.log.warn('Cannot update a transaction without an id');
      return false;
    }
    const id = record.id;

    const amount = coerceAmount(record.amount);
    if (amount === null) {
      this.log.error({ id, amount: record.amount }, 'Refusing update with non-numeric amount');
      return false;
    }

    try {
      const changes = this.withConnection(driver => {
        const categoryId = this.internCategory(driver, record.category);
        return driver.run(
          'UPDATE transactions SET description = ?, amount = ?, date = ?, category_id = ? WHERE id = ?',
          [record.description ?? null, amount, record.date, categoryId, id]
        ).changes;
      });
      return changes > 0;
    } catch (err) {
      this.log.error({ err, id }, 'Failed to update transaction');
      return false;
    }
  }

  deleteTransaction(id: number): boolean {
    try {
      const changes = this.withConnection(driver =>
        driver.run('DELETE FROM transactions WHERE id = ?', [id]).changes
      );
      return changes > 0;
    } catch (err) {
      this.log.error({ err, id }, 'Failed to delete transaction');
      return false;
    }
  }

  // ==================== CSV ====================

  exportToCsv(filePath: string): boolean {
    try {
      const { sql, params } = buildTransactionQuery();
      const rows = this.withConnection(driver => driver.all<TransactionWithCategoryRow>(sql, params));
      fs.writeFileSync(filePath, serializeTransactionsCsv(rows.map(row => this.mapTransaction(row))), 'utf8');
      this.log.info({ path: filePath, rows: rows.length }, 'Exported transactions to CSV');
      return true;
    } catch (err) {
      this.log.error({ err, path: filePath }, 'Failed to export transactions to CSV');
      return false;
    }
  }

  /**
   * Import rows from a CSV file and return how many were inserted. Rows are
   * validated like manual entry; invalid ones are logged and skipped.
   * Existing ids in the file are ignored.
   */
  importFromCsv(filePath: string): number {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (err) {
      this.log.warn({ err, path: filePath }, 'Could not read CSV file');
      return 0;
    }

    const { transactions, rejected } = parseTransactionsCsv(content);
    for (const row of rejected) {
      this.log.warn({ path: filePath, line: row.line, reason: row.reason }, 'Skipped invalid CSV row');
    }

    let imported = 0;
    for (const transaction of transactions) {
      if (this.addTransaction(toTransactionRecord(transaction)) !== null) {
        imported++;
      }
    }

    this.log.info({ path: filePath, imported, rejected: rejected.length }, 'Imported transactions from CSV');
    return imported;
  }

  // ==================== Maintenance ====================

  /**
   * Renumber transactions 1..n in ascending order of their current id.
   *
   * Rows are copied into a shadow table, the original is dropped and the
   * shadow renamed, all inside one SQLite transaction: either the whole
   * rebuild lands and the full old -> new mapping is returned, or nothing
   * changes and the result is a failure.
   *
   * Any id held outside the store (a UI selection, an exported file) is
   * stale once this succeeds.
   */
  compactTransactionIds(): QueryResult<Map<number, number>> {
    try {
      const mapping = this.withConnection(driver =>
        driver.transaction(() => {
          const idMap = new Map<number, number>();

          driver.exec(`DROP TABLE IF EXISTS ${SHADOW_TABLE}`);
          driver.exec(transactionsTableSql(SHADOW_TABLE));

          const rows = driver.all<TransactionRow>(
            'SELECT id, description, amount, date, category_id FROM transactions ORDER BY id ASC'
          );
          for (const row of rows) {
            const result = driver.run(
              `INSERT INTO ${SHADOW_TABLE} (description, amount, date, category_id) VALUES (?, ?, ?, ?)`,
              [row.description, row.amount, row.date, row.category_id]
            );
            idMap.set(row.id, result.lastInsertRowid);
          }

          driver.exec('DROP TABLE transactions');
          driver.exec(`ALTER TABLE ${SHADOW_TABLE} RENAME TO transactions`);
          return idMap;
        })
      );

      this.log.info({ rows: mapping.size }, 'Compacted transaction ids');
      return ok(mapping);
    } catch (err) {
      this.log.error({ err }, 'Transaction id compaction failed and was rolled back');
      return fail(errorMessage(err));
    }
  }
}
