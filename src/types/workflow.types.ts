import type { Receipt } from './receipt.types.ts';

export type CaptureInput =
  | { kind: 'image'; fileId: string; caption?: string; declaredMimeType?: string }
  | { kind: 'voice'; fileId: string; declaredMimeType?: string }
  | { kind: 'text'; text: string };

export type CommentInput =
  | { kind: 'text'; text: string }
  | { kind: 'voice'; fileId: string; declaredMimeType?: string };

export type InputKind = CaptureInput['kind'];

export type ResolveAction = 'approve' | 'reject';

export interface PendingCaptureEntry {
  userId: number;
  receipt: Receipt;
  originalJson: string;
  token: string;
  messageId: number | null;
  stagedAt: Date;
}

export interface Preview {
  token: string;
  merchant: string;
  category: string;
  totalAmount: number;
  isIncome: boolean;
  date: string | null;
  description?: string;
  itemCount: number;
  receipt: Receipt;
  // What the user sent, shown back in the preview
  echo?: { kind: InputKind; text: string };
  // Present when the preview replaces an earlier one
  revised: boolean;
  elapsedMs: number;
}

export type CommitResult =
  | { action: 'approved'; receiptId: number; receipt: Receipt }
  | { action: 'rejected' };

// ============================================================
// Errors
// ============================================================
export type WorkflowErrorKind =
  | 'validation'
  | 'malformed_output'
  | 'service'
  | 'cancelled'
  | 'stale_action';

/** Which step the user has to repeat; picks the retry wording. */
export type OperationType = 'receipt' | 'voice' | 'text' | 'changes' | 'voice_changes' | 'approval';

export interface WorkflowError {
  kind: WorkflowErrorKind;
  operation: OperationType;
  userMessage: string;
  technicalDetail: string;
  retryable: boolean;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: WorkflowError };
