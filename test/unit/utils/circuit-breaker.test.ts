/**
 * Tests for circuit-breaker.ts
 * Testing CircuitBreaker class state transitions and behavior
 */
import { describe, test, expect, beforeEach } from 'vitest';
import { CircuitBreaker } from '../../../src/utils/circuit-breaker.ts';

const wait = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('CircuitBreaker', () => {
  let breaker: CircuitBreaker;

  beforeEach(() => {
    breaker = new CircuitBreaker({ name: 'test', threshold: 3, cooldownMs: 1000 });
  });

  describe('initial state', () => {
    test('starts closed with no history', () => {
      expect(breaker.getState()).toEqual({
        state: 'closed',
        failureCount: 0,
        lastOpenedAt: null,
        lastSuccessAt: null,
      });
      expect(breaker.isAllowed()).toBe(true);
    });
  });

  describe('recording failures', () => {
    test('stays closed below the threshold', () => {
      breaker.recordFailure();
      breaker.recordFailure();

      expect(breaker.getState().failureCount).toBe(2);
      expect(breaker.getState().state).toBe('closed');
      expect(breaker.isAllowed()).toBe(true);
    });

    test('opens at the threshold', () => {
      breaker.recordFailure();
      breaker.recordFailure();
      breaker.recordFailure();

      expect(breaker.getState().state).toBe('open');
      expect(breaker.getState().lastOpenedAt).not.toBeNull();
      expect(breaker.isAllowed()).toBe(false);
    });
  });

  describe('recording success', () => {
    test('resets the failure count and records the time', () => {
      breaker.recordFailure();
      breaker.recordFailure();

      breaker.recordSuccess();

      expect(breaker.getState().failureCount).toBe(0);
      expect(breaker.getState().lastSuccessAt).not.toBeNull();
      expect(breaker.getState().state).toBe('closed');
    });
  });

  describe('cooldown', () => {
    test('moves to half_open after the cooldown and resets the count', async () => {
      breaker = new CircuitBreaker({ threshold: 2, cooldownMs: 10 });
      breaker.recordFailure();
      breaker.recordFailure();

      await wait(15);

      expect(breaker.isAllowed()).toBe(true);
      expect(breaker.getState().state).toBe('half_open');
      expect(breaker.getState().failureCount).toBe(0);
    });

    test('stays open while the cooldown runs', async () => {
      breaker = new CircuitBreaker({ threshold: 1, cooldownMs: 10000 });
      breaker.recordFailure();

      await wait(10);

      expect(breaker.isAllowed()).toBe(false);
      expect(breaker.getState().state).toBe('open');
    });

    test('a successful probe closes the circuit', async () => {
      breaker = new CircuitBreaker({ threshold: 1, cooldownMs: 10 });
      breaker.recordFailure();
      await wait(15);
      breaker.isAllowed();

      breaker.recordSuccess();

      expect(breaker.getState().state).toBe('closed');
    });

    test('a failed probe reopens at once, even with a higher threshold', async () => {
      breaker = new CircuitBreaker({ threshold: 3, cooldownMs: 10 });
      breaker.recordFailure();
      breaker.recordFailure();
      breaker.recordFailure();
      await wait(15);
      breaker.isAllowed();

      breaker.recordFailure();

      expect(breaker.getState().state).toBe('open');
      expect(breaker.isAllowed()).toBe(false);
    });
  });

  test('reset() returns to closed', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();

    breaker.reset();

    expect(breaker.getState().state).toBe('closed');
    expect(breaker.getState().failureCount).toBe(0);
    expect(breaker.getState().lastOpenedAt).toBeNull();
  });
});
