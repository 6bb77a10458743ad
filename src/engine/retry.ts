/**
 * Remote call retry policy.
 *
 * Transient failures (network errors, 5xx, rate limiting) are retried with
 * capped exponential backoff; everything else fails on the first attempt.
 */

import { RetryPolicy } from '../domain/config';
import { SyncError, syncAbortedError } from '../domain/errors';
import { EdgeApiError, remoteError } from '../edge/edge-api';
import { Logger } from '../logger';

/** Thrown when the abort check fires between attempts. */
export class RetryAbortedError extends Error {
  constructor() {
    super('Retry loop aborted');
    this.name = 'RetryAbortedError';
  }
}

/** Error raised after the last attempt, carrying the attempt count. */
export class RetryExhaustedError extends Error {
  constructor(public readonly cause: unknown, public readonly attempts: number) {
    super(cause instanceof Error ? cause.message : String(cause));
    this.name = 'RetryExhaustedError';
  }
}

export interface RetryOptions {
  /** Checked before every attempt. */
  shouldAbort?: () => boolean;
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void;
}

/** Whether a failure is worth another attempt. Non-EdgeApiError failures are treated as network errors. */
export function isRetryable(err: unknown): boolean {
  if (err instanceof EdgeApiError) return err.retryable;
  return true;
}

/** Compute the delay before the given retry (1-based attempt that just failed). */
export function computeBackoff(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  const exponential = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const delay = Math.max(exponential, retryAfterMs ?? 0);
  return Math.min(delay, policy.maxDelayMs);
}

/** Run `fn` under the retry policy. */
export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  let attempt = 0;
  for (;;) {
    if (options.shouldAbort?.()) throw new RetryAbortedError();
    attempt++;
    try {
      return await fn();
    } catch (err) {
      if (!isRetryable(err)) throw err;
      if (attempt >= policy.maxAttempts) throw new RetryExhaustedError(err, attempt);
      const retryAfterMs = err instanceof EdgeApiError ? err.retryAfterMs : undefined;
      const delay = computeBackoff(policy, attempt, retryAfterMs);
      options.onRetry?.(attempt, delay, err);
      await sleep(delay);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Where a remote call is made from. */
export interface RemoteCallContext {
  serviceId: string;
  operation: string;
  policy: RetryPolicy;
  shouldAbort?: () => boolean;
  log: Logger;
}

/**
 * Run one remote call under the retry policy, converting every failure into
 * a SyncError carrying the typed error (`SYNC.ABORTED` or a `REMOTE.*` code).
 */
export async function callRemote<T>(fn: () => Promise<T>, ctx: RemoteCallContext): Promise<T> {
  const { serviceId, operation } = ctx;
  try {
    return await withRetry(fn, ctx.policy, {
      shouldAbort: ctx.shouldAbort,
      onRetry: (attempt, delayMs, err) =>
        ctx.log.warn('Retrying remote call', {
          operation,
          attempt,
          delayMs,
          error: err instanceof Error ? err.message : String(err),
        }),
    });
  } catch (err) {
    if (err instanceof RetryAbortedError) throw new SyncError(syncAbortedError(serviceId));
    if (err instanceof RetryExhaustedError) {
      throw new SyncError(remoteError(err.cause, { serviceId, operation, attempts: err.attempts }));
    }
    throw new SyncError(remoteError(err, { serviceId, operation, attempts: 1 }));
  }
}
