import pg from 'pg';
import type { MonthlySummary, Position, Receipt, StoredReceipt } from '../types/receipt.types.ts';
import { getDatabaseUrl } from '../config/env.ts';
import { StorageError, errorMessage } from '../utils/errors.ts';
import { withRetry } from '../utils/retry.ts';
import { classifyDatabaseError } from '../utils/error-classifier.ts';

const { Pool } = pg;

/**
 * Durable receipt storage. Implementations throw StorageError.
 */
export interface ReceiptRepository {
  ensureUser(userId: number, name: string): Promise<void>;
  saveReceipt(receipt: Receipt): Promise<number>;
  getRecentReceipts(userId: number, limit: number): Promise<StoredReceipt[]>;
  // `date` is DD-MM-YYYY, the stored format
  getReceiptsByDate(userId: number, date: string): Promise<StoredReceipt[]>;
  deleteReceipt(receiptId: number, userId: number): Promise<boolean>;
  getMonthlySummary(userId: number, months: number, now?: Date): Promise<MonthlySummary[]>;
}

/**
 * Remembers which Telegram messages were already handled.
 */
export interface UpdateLog {
  // true the first time a (messageId, chatId) pair is seen
  checkIdempotency(messageId: string, chatId: string): Promise<boolean>;
  cleanupIdempotency(): Promise<number>;
}

export type ReceiptDatabase = ReceiptRepository & UpdateLog & { ping(): Promise<boolean> };

interface ReceiptRow {
  receipt_id: number;
  user_id: string;
  merchant: string;
  category: string;
  total_amount: string;
  is_income: boolean;
  date: string | null;
  text: string | null;
  description: string | null;
  reference_receipt_ids: number[] | null;
  created_at: Date;
}

interface PositionRow {
  receipt_id: number;
  description: string;
  quantity: string;
  category: string;
  price: string;
}

export interface MonthlyTotalsRow {
  month: string;
  expenses: string | number;
  income: string | number;
  count: string | number;
}

function monthIndex(month: string): number | null {
  const match = /^(\d{2})-(\d{4})$/.exec(month);
  if (!match) return null;
  return Number(match[2]) * 12 + Number(match[1]) - 1;
}

/**
 * Keep the last `months` calendar months (current one included), newest first.
 */
export function summarizeMonths(rows: MonthlyTotalsRow[], months: number, now: Date = new Date()): MonthlySummary[] {
  const currentIndex = now.getFullYear() * 12 + now.getMonth();
  const oldestIndex = currentIndex - months + 1;

  return rows
    .map(row => ({ row, index: monthIndex(row.month) }))
    .filter((entry): entry is { row: MonthlyTotalsRow; index: number } =>
      entry.index !== null && entry.index >= oldestIndex && entry.index <= currentIndex)
    .sort((a, b) => b.index - a.index)
    .map(({ row }) => ({
      month: row.month,
      expenses: Number(row.expenses),
      income: Number(row.income),
      count: Number(row.count),
    }));
}

export class DatabaseService implements ReceiptRepository, UpdateLog {
  private pool: pg.Pool;

  constructor(connectionString?: string) {
    this.pool = new Pool({
      connectionString: connectionString || getDatabaseUrl(),
      max: 10,
      idleTimeoutMillis: 30000,
    });
  }

  async ensureUser(userId: number, name: string): Promise<void> {
    await this.run('ensure user', () => this.pool.query(
      `INSERT INTO users (user_id, name) VALUES ($1, $2)
       ON CONFLICT (user_id) DO NOTHING`,
      [userId, name.slice(0, 255) || String(userId)]
    ));
  }

  // Receipt and positions are written in one transaction
  async saveReceipt(receipt: Receipt): Promise<number> {
    return this.run('save receipt', async () => {
      const client = await this.pool.connect();
      try {
        await client.query('BEGIN');

        const inserted = await client.query<{ receipt_id: number }>(
          `INSERT INTO receipts (
             user_id, merchant, category, total_amount, is_income,
             date, text, description, reference_receipt_ids
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
           RETURNING receipt_id`,
          [
            receipt.userId,
            receipt.merchant,
            receipt.category,
            receipt.totalAmount,
            receipt.isIncome,
            receipt.date,
            receipt.text ?? null,
            receipt.description ?? null,
            receipt.referenceReceiptIds,
          ]
        );
        const receiptId = inserted.rows[0]?.receipt_id;
        if (receiptId === undefined) {
          throw new Error('INSERT returned no receipt_id');
        }

        for (const [index, position] of receipt.positions.entries()) {
          await client.query(
            `INSERT INTO positions (receipt_id, position_index, description, quantity, category, price)
             VALUES ($1, $2, $3, $4, $5, $6)`,
            [receiptId, index, position.description, position.quantity, position.category, position.price]
          );
        }

        await client.query('COMMIT');
        console.log(`[Database] Receipt ${receiptId} saved with ${receipt.positions.length} positions`);
        return receiptId;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    }, false);
  }

  async getRecentReceipts(userId: number, limit: number): Promise<StoredReceipt[]> {
    return this.run('list receipts', async () => {
      const receipts = await this.pool.query<ReceiptRow>(
        `SELECT * FROM receipts WHERE user_id = $1
         ORDER BY receipt_id DESC LIMIT $2`,
        [userId, limit]
      );
      return this.withPositions(receipts.rows);
    });
  }

  async getReceiptsByDate(userId: number, date: string): Promise<StoredReceipt[]> {
    return this.run('receipts by date', async () => {
      const receipts = await this.pool.query<ReceiptRow>(
        `SELECT * FROM receipts WHERE user_id = $1 AND date = $2
         ORDER BY receipt_id`,
        [userId, date]
      );
      return this.withPositions(receipts.rows);
    });
  }

  async deleteReceipt(receiptId: number, userId: number): Promise<boolean> {
    return this.run('delete receipt', async () => {
      const result = await this.pool.query(
        'DELETE FROM receipts WHERE receipt_id = $1 AND user_id = $2',
        [receiptId, userId]
      );
      const deleted = (result.rowCount ?? 0) > 0;
      if (deleted) {
        console.log(`[Database] Receipt ${receiptId} deleted`);
      }
      return deleted;
    });
  }

  // Income counts negative: expenses - income per MM-YYYY
  async getMonthlySummary(userId: number, months: number, now: Date = new Date()): Promise<MonthlySummary[]> {
    return this.run('monthly summary', async () => {
      const result = await this.pool.query<MonthlyTotalsRow>(
        `SELECT substr(date, 4, 7) AS month,
                COALESCE(SUM(CASE WHEN is_income THEN 0 ELSE total_amount END), 0) AS expenses,
                COALESCE(SUM(CASE WHEN is_income THEN total_amount ELSE 0 END), 0) AS income,
                COUNT(*) AS count
         FROM receipts
         WHERE user_id = $1 AND date IS NOT NULL
         GROUP BY substr(date, 4, 7)`,
        [userId]
      );
      return summarizeMonths(result.rows, months, now);
    });
  }

  // Idempotency check
  async checkIdempotency(messageId: string, chatId: string): Promise<boolean> {
    const result = await this.pool.query(
      `INSERT INTO idempotency (message_id, chat_id, created_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (message_id, chat_id) DO NOTHING
       RETURNING 1`,
      [messageId, chatId]
    );
    return result.rows.length > 0;
  }

  // Cleanup old idempotency records
  async cleanupIdempotency(): Promise<number> {
    const result = await this.pool.query(
      `DELETE FROM idempotency WHERE created_at < NOW() - INTERVAL '1 hour'`
    );
    return result.rowCount ?? 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  // Health check
  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      console.error(`[Database] Ping failed: ${errorMessage(error)}`);
      return false;
    }
  }

  // Ensure database exists (connect to postgres, create if needed)
  static async ensureDatabaseExists(connectionString: string): Promise<void> {
    const url = new URL(connectionString);
    const dbName = url.pathname.slice(1);

    if (!dbName || dbName === 'postgres') {
      console.log('[Database] Using default postgres database, skipping creation');
      return;
    }
    if (!/^[A-Za-z0-9_]+$/.test(dbName)) {
      throw new StorageError(`Refusing to create database with name "${dbName}"`);
    }

    url.pathname = '/postgres';
    const adminPool = new Pool({ connectionString: url.toString(), max: 1 });

    try {
      const checkResult = await adminPool.query('SELECT 1 FROM pg_database WHERE datname = $1', [dbName]);
      if (checkResult.rows.length === 0) {
        console.log(`[Database] Creating database "${dbName}"...`);
        // CREATE DATABASE takes no parameters; the name is checked above
        await adminPool.query(`CREATE DATABASE "${dbName}"`);
      } else {
        console.log(`[Database] Database "${dbName}" already exists`);
      }
    } finally {
      await adminPool.end();
    }
  }

  // Creates tables if they don't exist
  async runMigrations(): Promise<void> {
    console.log('[Database] Running migrations...');

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS users (
        user_id BIGINT PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS receipts (
        receipt_id SERIAL PRIMARY KEY,
        user_id BIGINT NOT NULL REFERENCES users(user_id),
        merchant VARCHAR(255) NOT NULL,
        category VARCHAR(100) NOT NULL,
        total_amount NUMERIC(12,2) NOT NULL CHECK (total_amount >= 0),
        is_income BOOLEAN NOT NULL DEFAULT FALSE,
        date VARCHAR(10),
        text TEXT,
        description TEXT,
        reference_receipt_ids INTEGER[] NOT NULL DEFAULT '{}',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query('CREATE INDEX IF NOT EXISTS idx_receipts_user ON receipts(user_id, receipt_id DESC)');

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS positions (
        position_id SERIAL PRIMARY KEY,
        receipt_id INTEGER NOT NULL REFERENCES receipts(receipt_id) ON DELETE CASCADE,
        position_index INTEGER NOT NULL,
        description TEXT NOT NULL,
        quantity VARCHAR(50) NOT NULL,
        category VARCHAR(100) NOT NULL,
        price NUMERIC(10,2) NOT NULL CHECK (price >= 0)
      )
    `);
    await this.pool.query('CREATE INDEX IF NOT EXISTS idx_positions_receipt ON positions(receipt_id)');

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS idempotency (
        id SERIAL PRIMARY KEY,
        message_id VARCHAR(50) NOT NULL,
        chat_id VARCHAR(50) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT unique_message_chat UNIQUE (message_id, chat_id)
      )
    `);
    await this.pool.query('CREATE INDEX IF NOT EXISTS idx_idempotency_created ON idempotency(created_at)');

    console.log('[Database] Migrations complete');
  }

  /**
   * Run a query with retries for transient failures, wrapping the final error in StorageError.
   */
  private async run<T>(label: string, fn: () => Promise<T>, retry = true): Promise<T> {
    try {
      if (!retry) return await fn();
      return await withRetry(fn, {
        maxRetries: 2,
        baseDelayMs: 200,
        label: 'Database',
        shouldRetry: error => classifyDatabaseError(error)?.retryable ?? false,
      });
    } catch (error) {
      console.error(`[Database] ${label} failed: ${errorMessage(error)}`);
      throw new StorageError(`Failed to ${label}`, { cause: error });
    }
  }

  private async withPositions(rows: ReceiptRow[]): Promise<StoredReceipt[]> {
    if (rows.length === 0) return [];

    const ids = rows.map(row => row.receipt_id);
    const positions = await this.pool.query<PositionRow>(
      `SELECT receipt_id, description, quantity, category, price FROM positions
       WHERE receipt_id = ANY($1::int[])
       ORDER BY receipt_id, position_index`,
      [ids]
    );

    const byReceipt = new Map<number, Position[]>();
    for (const row of positions.rows) {
      const list = byReceipt.get(row.receipt_id) ?? [];
      list.push({
        description: row.description,
        quantity: row.quantity,
        category: row.category,
        price: Number(row.price),
      });
      byReceipt.set(row.receipt_id, list);
    }

    return rows.map(row => this.mapToReceipt(row, byReceipt.get(row.receipt_id) ?? []));
  }

  private mapToReceipt(row: ReceiptRow, positions: Position[]): StoredReceipt {
    const receipt: StoredReceipt = {
      id: row.receipt_id,
      userId: Number(row.user_id),
      merchant: row.merchant,
      category: row.category,
      totalAmount: Number(row.total_amount),
      isIncome: row.is_income,
      date: row.date,
      positions,
      referenceReceiptIds: row.reference_receipt_ids ?? [],
      createdAt: row.created_at.toISOString(),
    };
    if (row.description) receipt.description = row.description;
    if (row.text) receipt.text = row.text;
    return receipt;
  }
}
