import type { Receipt } from '../types/receipt.types.ts';
import type { PendingCaptureEntry } from '../types/workflow.types.ts';

/**
 * Per-user staging area for the receipt awaiting approval.
 * At most one entry per user; every stage() issues a new token.
 */
export interface PendingReceiptStore {
  stage(userId: number, receipt: Receipt, originalJson: string): string;
  get(userId: number): PendingCaptureEntry | undefined;
  clear(userId: number): void;
  // Puts a claimed entry back unless something was staged for the user since
  restore(entry: PendingCaptureEntry): boolean;
  // Records the preview message only while `token` is still current
  attachMessage(userId: number, token: string, messageId: number): boolean;
  size(): number;
}

export class InMemoryPendingReceiptStore implements PendingReceiptStore {
  private readonly entries = new Map<number, PendingCaptureEntry>();
  private counter = 0;
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  stage(userId: number, receipt: Receipt, originalJson: string): string {
    this.counter += 1;
    const token = String(this.counter);
    this.entries.set(userId, {
      userId,
      receipt,
      originalJson,
      token,
      messageId: null,
      stagedAt: this.now(),
    });
    return token;
  }

  get(userId: number): PendingCaptureEntry | undefined {
    return this.entries.get(userId);
  }

  clear(userId: number): void {
    this.entries.delete(userId);
  }

  restore(entry: PendingCaptureEntry): boolean {
    if (this.entries.has(entry.userId)) return false;
    this.entries.set(entry.userId, entry);
    return true;
  }

  attachMessage(userId: number, token: string, messageId: number): boolean {
    const entry = this.entries.get(userId);
    if (!entry || entry.token !== token) return false;
    this.entries.set(userId, { ...entry, messageId });
    return true;
  }

  size(): number {
    return this.entries.size;
  }
}
