/**
 * Tests for retry.ts
 * Testing withRetry function with exponential backoff
 */
import { describe, test, expect, vi, afterEach } from 'vitest';
import { withRetry } from '../../../src/utils/retry.ts';
import { OperationCancelledError } from '../../../src/utils/errors.ts';

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('successful execution', () => {
    test('returns the result when the first attempt succeeds', async () => {
      const fn = vi.fn(() => Promise.resolve({ data: 'test', count: 42 }));

      const result = await withRetry(fn);

      expect(result).toEqual({ data: 'test', count: 42 });
      expect(fn).toHaveBeenCalledTimes(1);
    });

    test('retries after an error and returns the later success', async () => {
      const fn = vi.fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('Temporary error'))
        .mockResolvedValue('success');

      const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 10, jitterMs: 0 });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(2);
    });
  });

  describe('failure after max retries', () => {
    test('throws the last error after maxRetries', async () => {
      let callCount = 0;
      const fn = vi.fn(() => {
        callCount++;
        return Promise.reject(new Error(`Error #${callCount}`));
      });

      await expect(
        withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 10, jitterMs: 0 })
      ).rejects.toThrow('Error #3');

      // 1 initial + 2 retries = 3 calls
      expect(fn).toHaveBeenCalledTimes(3);
    });

    test('does not retry with maxRetries = 0', async () => {
      const fn = vi.fn(() => Promise.reject(new Error('Error')));

      await expect(withRetry(fn, { maxRetries: 0 })).rejects.toThrow('Error');

      expect(fn).toHaveBeenCalledTimes(1);
    });

    test('stops when shouldRetry returns false', async () => {
      const fn = vi.fn(() => Promise.reject(new Error('400 Bad Request')));

      await expect(withRetry(fn, { shouldRetry: () => false })).rejects.toThrow('400 Bad Request');

      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  describe('exponential backoff', () => {
    test('delay doubles between attempts', async () => {
      vi.useFakeTimers();
      const fn = vi.fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('Error'))
        .mockRejectedValueOnce(new Error('Error'))
        .mockResolvedValue('success');

      const promise = withRetry(fn, { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 });

      await vi.advanceTimersByTimeAsync(99);
      expect(fn).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(fn).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(199);
      expect(fn).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(fn).toHaveBeenCalledTimes(3);

      await expect(promise).resolves.toBe('success');
    });

    test('delay is capped at maxDelayMs', async () => {
      vi.useFakeTimers();
      const fn = vi.fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('Error'))
        .mockRejectedValueOnce(new Error('Error'))
        .mockResolvedValue('success');

      const promise = withRetry(fn, { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 150, jitterMs: 0 });

      await vi.advanceTimersByTimeAsync(100);
      expect(fn).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(150);
      expect(fn).toHaveBeenCalledTimes(3);

      await expect(promise).resolves.toBe('success');
    });
  });

  describe('cancellation', () => {
    test('aborting during the wait rejects with OperationCancelledError', async () => {
      vi.useFakeTimers();
      const controller = new AbortController();
      const fn = vi.fn(() => Promise.reject(new Error('Error')));

      const promise = withRetry(fn, { baseDelayMs: 1000, jitterMs: 0, signal: controller.signal });
      const assertion = expect(promise).rejects.toBeInstanceOf(OperationCancelledError);

      await vi.advanceTimersByTimeAsync(10);
      controller.abort();

      await assertion;
      expect(fn).toHaveBeenCalledTimes(1);
    });

    test('an already aborted signal never calls fn', async () => {
      const controller = new AbortController();
      controller.abort();
      const fn = vi.fn(() => Promise.resolve('success'));

      await expect(withRetry(fn, { signal: controller.signal })).rejects.toBeInstanceOf(OperationCancelledError);

      expect(fn).not.toHaveBeenCalled();
    });
  });
});
