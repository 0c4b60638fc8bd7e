/**
 * Error classifier for PostgreSQL and application errors.
 * Maps anything thrown during a workflow step to a WorkflowError whose
 * userMessage tells the user which step to repeat.
 */
import { t } from '../i18n/index.ts';
import type { OperationType, WorkflowError } from '../types/workflow.types.ts';
import {
  MalformedOutputError,
  OperationCancelledError,
  ServiceError,
  StorageError,
  ValidationError,
  isAbortError,
  errorMessage,
} from './errors.ts';

interface PostgresError {
  code?: string;
  constraint?: string;
  detail?: string;
  message?: string;
}

/**
 * PostgreSQL error codes reference:
 * https://www.postgresql.org/docs/current/errcodes-appendix.html
 */
const PG_ERROR_CODES = {
  NOT_NULL_VIOLATION: '23502',
  FOREIGN_KEY_VIOLATION: '23503',
  UNIQUE_VIOLATION: '23505',
  CHECK_VIOLATION: '23514',
  SERIALIZATION_FAILURE: '40001',
  DEADLOCK_DETECTED: '40P01',
  QUERY_CANCELED: '57014',
} as const;

function asPostgresError(error: unknown): PostgresError | null {
  if (error === null || typeof error !== 'object') return null;
  const code: unknown = Reflect.get(error, 'code');
  if (typeof code !== 'string' || !/^[0-9A-Z]{5}$/.test(code)) return null;
  const constraint: unknown = Reflect.get(error, 'constraint');
  const detail: unknown = Reflect.get(error, 'detail');
  return {
    code,
    constraint: typeof constraint === 'string' ? constraint : undefined,
    detail: typeof detail === 'string' ? detail : undefined,
    message: errorMessage(error),
  };
}

export interface DatabaseErrorInfo {
  technicalDetail: string;
  retryable: boolean;
}

/**
 * Describe a pg driver error. Returns null when the error does not carry a SQLSTATE.
 */
export function classifyDatabaseError(error: unknown): DatabaseErrorInfo | null {
  const err = asPostgresError(error);
  if (!err?.code) return null;
  const code = err.code;

  if (code === PG_ERROR_CODES.UNIQUE_VIOLATION) {
    return { technicalDetail: `Unique violation on ${err.constraint ?? 'unknown'}: ${err.detail ?? ''}`, retryable: false };
  }
  if (code.startsWith('08')) {
    return { technicalDetail: `Connection error: ${code} - ${err.message}`, retryable: true };
  }
  if (code === PG_ERROR_CODES.QUERY_CANCELED) {
    return { technicalDetail: 'Query was canceled (timeout)', retryable: true };
  }
  if (code === PG_ERROR_CODES.DEADLOCK_DETECTED || code === PG_ERROR_CODES.SERIALIZATION_FAILURE) {
    return { technicalDetail: `Transaction error: ${code}`, retryable: true };
  }
  if (code.startsWith('53') || code.startsWith('57')) {
    return { technicalDetail: `Server unavailable: ${code} - ${err.message}`, retryable: true };
  }
  if (
    code === PG_ERROR_CODES.FOREIGN_KEY_VIOLATION ||
    code === PG_ERROR_CODES.NOT_NULL_VIOLATION ||
    code === PG_ERROR_CODES.CHECK_VIOLATION
  ) {
    return { technicalDetail: `Constraint violation ${code}: ${err.detail ?? err.message}`, retryable: false };
  }

  return { technicalDetail: `Database error ${code}: ${err.message}`, retryable: false };
}

/**
 * Classify anything thrown while running a workflow step.
 */
export function classifyError(error: unknown, operation: OperationType): WorkflowError {
  if (error instanceof ValidationError) {
    return {
      kind: 'validation',
      operation,
      userMessage: error.userFacing ? error.message : t('ui.errors.invalidInput'),
      technicalDetail: error.message,
      retryable: false,
    };
  }

  if (error instanceof MalformedOutputError) {
    return {
      kind: 'malformed_output',
      operation,
      userMessage: t(`ui.errors.malformed.${operation}`),
      technicalDetail: `${error.message}; output: ${error.rawOutput.slice(0, 200)}`,
      retryable: true,
    };
  }

  if (error instanceof OperationCancelledError || isAbortError(error)) {
    return {
      kind: 'cancelled',
      operation,
      userMessage: t('ui.errors.cancelled'),
      technicalDetail: errorMessage(error),
      retryable: true,
    };
  }

  if (error instanceof ServiceError) {
    return {
      kind: 'service',
      operation,
      userMessage: t(`ui.errors.failed.${operation}`),
      technicalDetail: `${error.service}${error.status !== null ? ` (${error.status})` : ''}: ${error.message}`,
      retryable: error.retryable,
    };
  }

  if (error instanceof StorageError) {
    const db = classifyDatabaseError(error.cause);
    return {
      kind: 'service',
      operation,
      userMessage: t(`ui.errors.failed.${operation}`),
      technicalDetail: db ? `${error.message}: ${db.technicalDetail}` : `${error.message}: ${errorMessage(error.cause)}`,
      retryable: db?.retryable ?? true,
    };
  }

  const db = classifyDatabaseError(error);
  if (db) {
    return {
      kind: 'service',
      operation,
      userMessage: t(`ui.errors.failed.${operation}`),
      technicalDetail: db.technicalDetail,
      retryable: db.retryable,
    };
  }

  // Network failures surface from fetch as TypeError
  if (error instanceof TypeError && /fetch|network/i.test(error.message)) {
    return {
      kind: 'service',
      operation,
      userMessage: t(`ui.errors.failed.${operation}`),
      technicalDetail: error.message,
      retryable: true,
    };
  }

  if (error instanceof Error && error.name === 'TimeoutError') {
    return {
      kind: 'service',
      operation,
      userMessage: t(`ui.errors.failed.${operation}`),
      technicalDetail: `Timeout: ${error.message}`,
      retryable: true,
    };
  }

  return {
    kind: 'service',
    operation,
    userMessage: t(`ui.errors.failed.${operation}`),
    technicalDetail: errorMessage(error),
    retryable: false,
  };
}

/**
 * Error for an action that no longer applies: a button whose token is not
 * current, or a revision or resolution with nothing pending.
 */
export function staleActionError(
  detail: string,
  options: { operation?: OperationType; missing?: boolean } = {}
): WorkflowError {
  return {
    kind: 'stale_action',
    operation: options.operation ?? 'approval',
    userMessage: options.missing ? t('ui.errors.noPending') : t('ui.errors.stale'),
    technicalDetail: detail,
    retryable: false,
  };
}
