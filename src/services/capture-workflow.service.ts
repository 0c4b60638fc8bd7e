import { getEnv } from '../config/env.ts';
import { t } from '../i18n/index.ts';
import { extractJsonPayload, parseJsonOutput } from '../parsers/ai-output.parser.ts';
import { parseReceiptData } from '../parsers/receipt.parser.ts';
import { sanitizeText, validateReceiptJson } from '../parsers/sanitizer.ts';
import { classifyError, staleActionError } from '../utils/error-classifier.ts';
import {
  MalformedOutputError,
  ValidationError,
  errorMessage,
  fail,
  ok,
  throwIfAborted,
} from '../utils/errors.ts';
import { ALLOWED_AUDIO_TYPES, ALLOWED_IMAGE_TYPES, validateFile, type FileSource } from './file.service.ts';
import type { PendingReceiptStore } from './pending-receipt.store.ts';
import type { ReceiptRepository } from './database.service.ts';
import type { ReceiptExtractor, Transcriber } from '../types/ai.types.ts';
import type { Receipt, ReceiptPayload } from '../types/receipt.types.ts';
import type {
  CaptureInput,
  CommentInput,
  CommitResult,
  InputKind,
  OperationType,
  PendingCaptureEntry,
  Preview,
  Result,
  WorkflowError,
} from '../types/workflow.types.ts';

const CAPTURE_TEXT_MAX_LENGTH = 1000;
const COMMENT_MAX_LENGTH = 500;

/**
 * Side effects the workflow triggers in the chat while it runs.
 */
export interface WorkflowNotifier {
  transcriptReady(chatId: number, purpose: 'receipt' | 'comment', transcript: string, elapsedMs: number): Promise<void>;
  previewSuperseded(chatId: number, messageId: number): Promise<void>;
}

export interface CaptureWorkflowDependencies {
  store: PendingReceiptStore;
  extractor: ReceiptExtractor;
  transcriber: Transcriber;
  files: FileSource;
  repository: ReceiptRepository;
  notifier?: WorkflowNotifier;
}

interface CaptureWorkflowConfig {
  maxFileSize: number;
  // Upper bound for one capture or revision, AI calls included
  operationTimeoutMs: number;
}

export interface OperationOptions {
  signal?: AbortSignal;
  // Defaults to the user id (private chats)
  chatId?: number;
}

export interface ResolveOptions {
  userName?: string;
}

const CAPTURE_OPERATIONS: Record<InputKind, OperationType> = {
  image: 'receipt',
  voice: 'voice',
  text: 'text',
};

function validateOutput(payload: string, raw: string): ReceiptPayload {
  try {
    return validateReceiptJson(parseJsonOutput(payload));
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new MalformedOutputError(error.message, raw, { cause: error });
    }
    throw error;
  }
}

/**
 * Capture-and-confirm state machine. Per user: Idle, or one pending
 * receipt awaiting Approve / Reject. Every staged candidate gets a new
 * token and only the current token resolves it.
 *
 * The store is written only after every external call of a step has
 * succeeded, so a failed step leaves the previous pending receipt as it was.
 */
export class CaptureWorkflowService {
  private deps: CaptureWorkflowDependencies;
  private config: CaptureWorkflowConfig;

  constructor(deps: CaptureWorkflowDependencies, config: Partial<CaptureWorkflowConfig> = {}) {
    const env = getEnv();
    this.deps = deps;
    this.config = {
      maxFileSize: env.MAX_FILE_SIZE,
      operationTimeoutMs: env.AI_TIMEOUT_MS * 2,
      ...config,
    };
  }

  async beginCapture(userId: number, input: CaptureInput, options: OperationOptions = {}): Promise<Result<Preview>> {
    const operation = CAPTURE_OPERATIONS[input.kind];
    const chatId = options.chatId ?? userId;
    const signal = this.operationSignal(options.signal);

    try {
      let raw: string;
      let echo: string | undefined;
      let elapsedMs: number;

      if (input.kind === 'image') {
        const bytes = await this.deps.files.getFileBytes(input.fileId, signal);
        const mimeType = validateFile(bytes, ALLOWED_IMAGE_TYPES, this.config.maxFileSize, input.declaredMimeType);
        const caption = sanitizeText(input.caption) || undefined;
        echo = caption;

        const started = Date.now();
        raw = await this.deps.extractor.extractFromImage(bytes, mimeType, caption, signal);
        elapsedMs = Date.now() - started;
      } else if (input.kind === 'voice') {
        const transcript = await this.transcribeVoice(input.fileId, input.declaredMimeType, chatId, 'receipt', signal);
        echo = transcript;

        const started = Date.now();
        raw = await this.deps.extractor.extractFromText(transcript, signal);
        elapsedMs = Date.now() - started;
      } else {
        const text = sanitizeText(input.text, CAPTURE_TEXT_MAX_LENGTH);
        if (!text) {
          throw new ValidationError(t('ui.errors.emptyText'));
        }
        echo = text;

        const started = Date.now();
        raw = await this.deps.extractor.extractFromText(text, signal);
        elapsedMs = Date.now() - started;
      }

      const { receipt, json } = this.interpret(raw, userId);
      throwIfAborted(signal);

      const previous = this.deps.store.get(userId);
      const token = this.deps.store.stage(userId, receipt, json);
      console.log(`[CaptureWorkflow] Staged ${input.kind} capture for ${userId} (token ${token})`);

      if (previous) {
        await this.clearPreviousPreview(chatId, previous);
      }

      return ok(this.buildPreview(receipt, token, { echo, kind: input.kind, revised: false, elapsedMs }));
    } catch (error) {
      return fail(this.reportFailure(error, operation, userId));
    }
  }

  async revise(userId: number, comment: CommentInput, options: OperationOptions = {}): Promise<Result<Preview>> {
    const operation: OperationType = comment.kind === 'voice' ? 'voice_changes' : 'changes';
    const chatId = options.chatId ?? userId;

    const entry = this.deps.store.get(userId);
    if (!entry) {
      return fail(staleActionError(`No pending receipt for ${userId}`, { operation, missing: true }));
    }

    const signal = this.operationSignal(options.signal);

    try {
      let text: string;
      if (comment.kind === 'voice') {
        text = await this.transcribeVoice(comment.fileId, comment.declaredMimeType, chatId, 'comment', signal);
      } else {
        text = sanitizeText(comment.text, COMMENT_MAX_LENGTH);
        if (!text) {
          throw new ValidationError(t('ui.errors.emptyComment'));
        }
      }

      // Each revision starts from the candidate currently staged
      const started = Date.now();
      const raw = await this.deps.extractor.applyComment(entry.originalJson, text, signal);
      const elapsedMs = Date.now() - started;

      const { receipt, json } = this.interpret(raw, userId);
      throwIfAborted(signal);

      // Approved, rejected or revised while the AI was working
      const current = this.deps.store.get(userId);
      if (current?.token !== entry.token) {
        console.log(`[CaptureWorkflow] Dropping revision of token ${entry.token} for ${userId}: entry changed`);
        return fail(staleActionError(`Token ${entry.token} changed during revision`, {
          operation,
          missing: current === undefined,
        }));
      }

      const token = this.deps.store.stage(userId, receipt, json);
      console.log(`[CaptureWorkflow] Revised receipt for ${userId} (token ${entry.token} -> ${token})`);

      await this.clearPreviousPreview(chatId, current);

      return ok(this.buildPreview(receipt, token, { echo: text, kind: comment.kind, revised: true, elapsedMs }));
    } catch (error) {
      return fail(this.reportFailure(error, operation, userId));
    }
  }

  async resolve(userId: number, action: string, token: string, options: ResolveOptions = {}): Promise<Result<CommitResult>> {
    if (action !== 'approve' && action !== 'reject') {
      return fail(staleActionError(`Unknown action "${action}"`));
    }

    const entry = this.deps.store.get(userId);
    if (!entry) {
      return fail(staleActionError(`No pending receipt for ${userId}`, { missing: true }));
    }
    if (entry.token !== token) {
      console.log(`[CaptureWorkflow] Stale ${action} for ${userId}: token ${token}, current ${entry.token}`);
      return fail(staleActionError(`Token ${token} does not match current token ${entry.token}`));
    }

    // Claimed before the first await: a concurrent press or revision finds no entry
    this.deps.store.clear(userId);

    if (action === 'reject') {
      console.log(`[CaptureWorkflow] Rejected receipt for ${userId}`);
      return ok({ action: 'rejected' });
    }

    let receiptId: number;
    try {
      await this.deps.repository.ensureUser(userId, options.userName ?? String(userId));
      receiptId = await this.deps.repository.saveReceipt(entry.receipt);
    } catch (error) {
      // Back in place so Approve can be pressed again, unless a newer receipt took the slot
      if (!this.deps.store.restore(entry)) {
        console.warn(`[CaptureWorkflow] Not restoring token ${token} for ${userId}: a newer receipt is pending`);
      }
      return fail(this.reportFailure(error, 'approval', userId));
    }

    console.log(`[CaptureWorkflow] Approved receipt for ${userId}, saved as ${receiptId}`);

    return ok({ action: 'approved', receiptId, receipt: entry.receipt });
  }

  /**
   * Drop the pending receipt without a token (the /cancel command).
   */
  discard(userId: number): boolean {
    const existed = this.deps.store.get(userId) !== undefined;
    this.deps.store.clear(userId);
    return existed;
  }

  getPending(userId: number): PendingCaptureEntry | undefined {
    return this.deps.store.get(userId);
  }

  attachPreviewMessage(userId: number, token: string, messageId: number): boolean {
    return this.deps.store.attachMessage(userId, token, messageId);
  }

  private async transcribeVoice(
    fileId: string,
    declaredMimeType: string | undefined,
    chatId: number,
    purpose: 'receipt' | 'comment',
    signal: AbortSignal
  ): Promise<string> {
    const bytes = await this.deps.files.getFileBytes(fileId, signal);
    const mimeType = validateFile(bytes, ALLOWED_AUDIO_TYPES, this.config.maxFileSize, declaredMimeType);

    const started = Date.now();
    const transcript = sanitizeText(await this.deps.transcriber.transcribe(bytes, mimeType, signal), CAPTURE_TEXT_MAX_LENGTH);
    if (!transcript) {
      throw new ValidationError(t(purpose === 'receipt' ? 'ui.errors.emptyText' : 'ui.errors.emptyComment'));
    }

    void this.echoTranscript(chatId, purpose, transcript, Date.now() - started);
    return transcript;
  }

  // Fire-and-forget: a failed echo never fails the step
  private async echoTranscript(
    chatId: number,
    purpose: 'receipt' | 'comment',
    transcript: string,
    elapsedMs: number
  ): Promise<void> {
    if (!this.deps.notifier) return;
    try {
      await this.deps.notifier.transcriptReady(chatId, purpose, transcript, elapsedMs);
    } catch (error) {
      console.warn(`[CaptureWorkflow] Transcript echo failed: ${errorMessage(error)}`);
    }
  }

  private async clearPreviousPreview(chatId: number, entry: PendingCaptureEntry): Promise<void> {
    if (!this.deps.notifier || entry.messageId === null) return;
    try {
      await this.deps.notifier.previewSuperseded(chatId, entry.messageId);
    } catch (error) {
      console.warn(`[CaptureWorkflow] Could not clear buttons of message ${entry.messageId}: ${errorMessage(error)}`);
    }
  }

  /**
   * Raw AI text -> validated receipt. Anything the AI got wrong is malformed output.
   */
  private interpret(raw: string, userId: number): { receipt: Receipt; json: string } {
    const validated = validateOutput(extractJsonPayload(raw), raw);
    return {
      receipt: parseReceiptData(validated, userId),
      json: JSON.stringify(validated),
    };
  }

  private buildPreview(
    receipt: Receipt,
    token: string,
    meta: { echo: string | undefined; kind: InputKind; revised: boolean; elapsedMs: number }
  ): Preview {
    const preview: Preview = {
      token,
      merchant: receipt.merchant,
      category: receipt.category,
      totalAmount: receipt.totalAmount,
      isIncome: receipt.isIncome,
      date: receipt.date,
      itemCount: receipt.positions.length,
      receipt,
      revised: meta.revised,
      elapsedMs: meta.elapsedMs,
    };
    if (receipt.description !== undefined) preview.description = receipt.description;
    if (meta.echo) preview.echo = { kind: meta.kind, text: meta.echo };
    return preview;
  }

  private operationSignal(signal: AbortSignal | undefined): AbortSignal {
    const timeout = AbortSignal.timeout(this.config.operationTimeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  private reportFailure(error: unknown, operation: OperationType, userId: number): WorkflowError {
    const workflowError = classifyError(error, operation);
    const log = workflowError.kind === 'service' ? console.error : console.warn;
    log(`[CaptureWorkflow] ${operation} failed for ${userId} (${workflowError.kind}): ${workflowError.technicalDetail}`);
    return workflowError;
  }
}
