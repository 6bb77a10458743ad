/**
 * Tests for the remote call retry policy.
 */

import {
  RetryAbortedError,
  RetryExhaustedError,
  callRemote,
  computeBackoff,
  isRetryable,
  withRetry,
} from '../../src/engine/retry';
import { EdgeApiError } from '../../src/edge/edge-api';
import { SyncError } from '../../src/domain/errors';
import { createLogger } from '../../src/logger';

const POLICY = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 1000 };
const FAST = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 };

function failing(errors: unknown[], result = 'ok'): { fn: () => Promise<string>; calls: () => number } {
  let calls = 0;
  return {
    fn: async () => {
      const error = errors[calls];
      calls++;
      if (error !== undefined) throw error;
      return result;
    },
    calls: () => calls,
  };
}

describe('computeBackoff', () => {
  test('doubles per attempt and caps at maxDelayMs', () => {
    expect(computeBackoff(POLICY, 1)).toBe(100);
    expect(computeBackoff(POLICY, 2)).toBe(200);
    expect(computeBackoff(POLICY, 3)).toBe(400);
    expect(computeBackoff(POLICY, 5)).toBe(1000);
  });

  test('honors a longer retry-after hint, still capped', () => {
    expect(computeBackoff(POLICY, 1, 700)).toBe(700);
    expect(computeBackoff(POLICY, 3, 50)).toBe(400);
    expect(computeBackoff(POLICY, 1, 5000)).toBe(1000);
  });
});

describe('isRetryable', () => {
  test('transient and rate limited errors are retried, the rest are not', () => {
    expect(isRetryable(new EdgeApiError('transient', 'x', 503))).toBe(true);
    expect(isRetryable(new EdgeApiError('rate_limited', 'x', 429, 1000))).toBe(true);
    expect(isRetryable(new EdgeApiError('auth', 'x', 401))).toBe(false);
    expect(isRetryable(new EdgeApiError('conflict', 'x', 409))).toBe(false);
    expect(isRetryable(new Error('socket hang up'))).toBe(true);
  });
});

describe('withRetry', () => {
  test('retries transient failures until success', async () => {
    const transient = new EdgeApiError('transient', 'unavailable', 503);
    const call = failing([transient, transient]);
    const retries: number[] = [];

    await expect(withRetry(call.fn, FAST, { onRetry: (attempt) => retries.push(attempt) })).resolves.toBe('ok');
    expect(call.calls()).toBe(3);
    expect(retries).toEqual([1, 2]);
  });

  test('non-retryable failures surface on the first attempt', async () => {
    const auth = new EdgeApiError('auth', 'bad token', 401);
    const call = failing([auth]);

    await expect(withRetry(call.fn, FAST)).rejects.toBe(auth);
    expect(call.calls()).toBe(1);
  });

  test('gives up after maxAttempts with the attempt count', async () => {
    const transient = new EdgeApiError('transient', 'unavailable', 503);
    const call = failing([transient, transient, transient, transient]);

    const err = await withRetry(call.fn, FAST).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err instanceof RetryExhaustedError && err.attempts).toBe(3);
    expect(err instanceof RetryExhaustedError && err.cause).toBe(transient);
    expect(call.calls()).toBe(3);
  });

  test('the abort check runs before each attempt', async () => {
    const call = failing([]);
    await expect(withRetry(call.fn, FAST, { shouldAbort: () => true })).rejects.toBeInstanceOf(RetryAbortedError);
    expect(call.calls()).toBe(0);
  });
});

describe('callRemote', () => {
  const ctx = { serviceId: 'svc1', operation: 'cloneVersion', policy: FAST, log: createLogger({ test: true }) };

  test('maps refused credentials to REMOTE.AUTH_FAILURE', async () => {
    const call = failing([new EdgeApiError('auth', 'bad token', 401)]);
    const err = await callRemote(call.fn, ctx).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SyncError);
    if (!(err instanceof SyncError)) return;
    expect(err.typedError.code).toBe('REMOTE.AUTH_FAILURE');
    expect(err.typedError.serviceId).toBe('svc1');
    expect(err.typedError.message).toBe('cloneVersion failed: bad token');
    expect(err.typedError.details).toEqual({ operation: 'cloneVersion', kind: 'auth', statusCode: 401, attempts: 1 });
  });

  test('exhausted transient failures keep the attempt count', async () => {
    const transient = new EdgeApiError('transient', 'unavailable', 503);
    const call = failing([transient, transient, transient]);
    const err = await callRemote(call.fn, ctx).catch((e: unknown) => e);

    expect(err instanceof SyncError && err.typedError.code).toBe('REMOTE.TRANSIENT');
    expect(err instanceof SyncError && err.typedError.retryable).toBe(true);
    expect(err instanceof SyncError && err.typedError.details?.attempts).toBe(3);
  });

  test('an abort becomes SYNC.ABORTED', async () => {
    const call = failing([]);
    const err = await callRemote(call.fn, { ...ctx, shouldAbort: () => true }).catch((e: unknown) => e);
    expect(err instanceof SyncError && err.typedError.code).toBe('SYNC.ABORTED');
  });
});
