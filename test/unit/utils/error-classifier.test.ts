/**
 * Tests for error-classifier.ts
 * Testing classifyDatabaseError, classifyError and staleActionError
 */
import { describe, test, expect } from 'vitest';
import { classifyDatabaseError, classifyError, staleActionError } from '../../../src/utils/error-classifier.ts';
import {
  MalformedOutputError,
  OperationCancelledError,
  ServiceError,
  StorageError,
  ValidationError,
} from '../../../src/utils/errors.ts';
import { t } from '../../../src/i18n/index.ts';

describe('classifyDatabaseError', () => {
  test('unique violation is not retryable', () => {
    const result = classifyDatabaseError({
      code: '23505',
      constraint: 'unique_message_chat',
      detail: 'Key (message_id, chat_id)=(1, 2) already exists',
    });

    expect(result).toEqual({
      technicalDetail: 'Unique violation on unique_message_chat: Key (message_id, chat_id)=(1, 2) already exists',
      retryable: false,
    });
  });

  test.each(['08006', '57014', '40P01', '40001', '53300'])('%s is retryable', code => {
    expect(classifyDatabaseError({ code, message: 'boom' })?.retryable).toBe(true);
  });

  test.each(['23502', '23503', '23514', '42P01'])('%s is not retryable', code => {
    expect(classifyDatabaseError({ code, message: 'boom' })?.retryable).toBe(false);
  });

  test('returns null without a SQLSTATE', () => {
    expect(classifyDatabaseError(new Error('plain'))).toBeNull();
    expect(classifyDatabaseError({ code: 'ECONNREFUSED' })).toBeNull();
    expect(classifyDatabaseError(null)).toBeNull();
  });
});

describe('classifyError', () => {
  test('user-facing validation errors keep their message', () => {
    const result = classifyError(new ValidationError('File too large. Maximum size allowed: 10MB'), 'receipt');

    expect(result).toEqual({
      kind: 'validation',
      operation: 'receipt',
      userMessage: 'File too large. Maximum size allowed: 10MB',
      technicalDetail: 'File too large. Maximum size allowed: 10MB',
      retryable: false,
    });
  });

  test('internal validation errors get the generic input message', () => {
    const result = classifyError(new ValidationError('Invalid user ID', { userFacing: false }), 'text');

    expect(result.userMessage).toBe(t('ui.errors.invalidInput'));
  });

  test('malformed output names the step to repeat', () => {
    const result = classifyError(new MalformedOutputError('No JSON object in AI output', 'hello'), 'voice_changes');

    expect(result.kind).toBe('malformed_output');
    expect(result.userMessage).toBe(t('ui.errors.malformed.voice_changes'));
    expect(result.technicalDetail).toBe('No JSON object in AI output; output: hello');
    expect(result.retryable).toBe(true);
  });

  test('cancellation and abort errors are cancelled', () => {
    expect(classifyError(new OperationCancelledError(), 'text').kind).toBe('cancelled');

    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    expect(classifyError(abort, 'text').kind).toBe('cancelled');
  });

  test('service errors carry service and status', () => {
    const result = classifyError(new ServiceError('openrouter', 'Bad gateway', { status: 502 }), 'receipt');

    expect(result.kind).toBe('service');
    expect(result.userMessage).toBe(t('ui.errors.failed.receipt'));
    expect(result.technicalDetail).toBe('openrouter (502): Bad gateway');
    expect(result.retryable).toBe(true);
  });

  test('4xx service errors are not retryable', () => {
    expect(classifyError(new ServiceError('groq', 'Unauthorized', { status: 401 }), 'voice').retryable).toBe(false);
  });

  test('storage errors describe the underlying database error', () => {
    const cause = Object.assign(new Error('connection terminated'), { code: '08006' });
    const result = classifyError(new StorageError('Failed to save receipt', { cause }), 'approval');

    expect(result.kind).toBe('service');
    expect(result.userMessage).toBe(t('ui.errors.failed.approval'));
    expect(result.technicalDetail).toBe('Failed to save receipt: Connection error: 08006 - connection terminated');
    expect(result.retryable).toBe(true);
  });

  test('fetch network failures are retryable service errors', () => {
    const result = classifyError(new TypeError('fetch failed'), 'text');

    expect(result.kind).toBe('service');
    expect(result.retryable).toBe(true);
  });

  test('unknown errors are non-retryable service errors', () => {
    const result = classifyError('something odd', 'changes');

    expect(result).toEqual({
      kind: 'service',
      operation: 'changes',
      userMessage: t('ui.errors.failed.changes'),
      technicalDetail: 'something odd',
      retryable: false,
    });
  });
});

describe('staleActionError', () => {
  test('defaults to the inactive button message', () => {
    expect(staleActionError('token mismatch')).toEqual({
      kind: 'stale_action',
      operation: 'approval',
      userMessage: t('ui.errors.stale'),
      technicalDetail: 'token mismatch',
      retryable: false,
    });
  });

  test('asks to start over when nothing is pending', () => {
    expect(staleActionError('missing', { operation: 'changes', missing: true }).userMessage).toBe(t('ui.errors.noPending'));
  });
});
