/**
 * In-memory receipt database for testing
 */
import { summarizeMonths, type MonthlyTotalsRow, type ReceiptDatabase } from '../../src/services/database.service.ts';
import type { MonthlySummary, Receipt, StoredReceipt } from '../../src/types/receipt.types.ts';
import { StorageError } from '../../src/utils/errors.ts';

export interface InMemoryDatabaseOptions {
  receipts?: StoredReceipt[];
  // saveReceipt throws StorageError while this is set
  failSaves?: boolean;
  healthy?: boolean;
}

export class InMemoryReceiptDatabase implements ReceiptDatabase {
  readonly users = new Map<number, string>();
  readonly receipts: StoredReceipt[];
  readonly processed = new Set<string>();
  failSaves: boolean;
  healthy: boolean;
  private nextId: number;

  constructor(options: InMemoryDatabaseOptions = {}) {
    this.receipts = [...(options.receipts ?? [])];
    this.failSaves = options.failSaves ?? false;
    this.healthy = options.healthy ?? true;
    this.nextId = this.receipts.reduce((max, r) => Math.max(max, r.id), 0) + 1;
  }

  async ensureUser(userId: number, name: string): Promise<void> {
    if (!this.users.has(userId)) this.users.set(userId, name);
  }

  async saveReceipt(receipt: Receipt): Promise<number> {
    if (this.failSaves) {
      throw new StorageError('Failed to save receipt', { cause: new Error('connection refused') });
    }
    const id = this.nextId++;
    this.receipts.push({ ...receipt, id, createdAt: new Date().toISOString() });
    return id;
  }

  async getRecentReceipts(userId: number, limit: number): Promise<StoredReceipt[]> {
    return this.receipts
      .filter(r => r.userId === userId)
      .sort((a, b) => b.id - a.id)
      .slice(0, limit);
  }

  async getReceiptsByDate(userId: number, date: string): Promise<StoredReceipt[]> {
    return this.receipts
      .filter(r => r.userId === userId && r.date === date)
      .sort((a, b) => a.id - b.id);
  }

  async deleteReceipt(receiptId: number, userId: number): Promise<boolean> {
    const index = this.receipts.findIndex(r => r.id === receiptId && r.userId === userId);
    if (index === -1) return false;
    this.receipts.splice(index, 1);
    return true;
  }

  async getMonthlySummary(userId: number, months: number, now: Date = new Date()): Promise<MonthlySummary[]> {
    const rows = new Map<string, MonthlyTotalsRow>();
    for (const receipt of this.receipts) {
      if (receipt.userId !== userId || receipt.date === null) continue;
      const month = receipt.date.slice(3, 10);
      const row = rows.get(month) ?? { month, expenses: 0, income: 0, count: 0 };
      rows.set(month, {
        month,
        expenses: Number(row.expenses) + (receipt.isIncome ? 0 : receipt.totalAmount),
        income: Number(row.income) + (receipt.isIncome ? receipt.totalAmount : 0),
        count: Number(row.count) + 1,
      });
    }
    return summarizeMonths([...rows.values()], months, now);
  }

  async checkIdempotency(messageId: string, chatId: string): Promise<boolean> {
    const key = `${chatId}:${messageId}`;
    if (this.processed.has(key)) return false;
    this.processed.add(key);
    return true;
  }

  async cleanupIdempotency(): Promise<number> {
    const removed = this.processed.size;
    this.processed.clear();
    return removed;
  }

  async ping(): Promise<boolean> {
    return this.healthy;
  }
}
