import type { Result, WorkflowError } from '../types/workflow.types.ts';

/**
 * Errors thrown below the workflow layer. The workflow turns every one
 * of them into a WorkflowError via classifyError().
 */

/** Input the user sent cannot be processed (empty text, oversized file, wrong type). */
export class ValidationError extends Error {
  readonly userFacing: boolean;

  constructor(message: string, options: { userFacing?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ValidationError';
    this.userFacing = options.userFacing ?? true;
  }
}

/** The AI answered, but not with a usable receipt document. */
export class MalformedOutputError extends Error {
  readonly rawOutput: string;

  constructor(message: string, rawOutput: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'MalformedOutputError';
    this.rawOutput = rawOutput;
  }
}

/** An upstream service (AI, transcription, Telegram file API) failed. */
export class ServiceError extends Error {
  readonly service: string;
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(
    service: string,
    message: string,
    options: { status?: number; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ServiceError';
    this.service = service;
    this.status = options.status ?? null;
    this.retryable = options.retryable ?? isRetryableStatus(options.status);
  }
}

/** The caller's signal fired before the operation completed. */
export class OperationCancelledError extends Error {
  constructor(message = 'Operation cancelled', options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'OperationCancelledError';
  }
}

/** The receipt repository could not complete a write or read. */
export class StorageError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StorageError';
  }
}

export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Throw OperationCancelledError when the signal has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError('Operation cancelled', { cause: signal.reason });
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error instanceof OperationCancelledError);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================
// Result helpers
// ============================================================

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: WorkflowError): Result<T> {
  return { ok: false, error };
}
