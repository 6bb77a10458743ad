/**
 * Sliding-window rate limiter for the status API.
 *
 * Keyed by client address. The status API runs inside the engine's own
 * process, so the window is kept in memory.
 */

import { Request, Response, NextFunction } from 'express';
import { createTypedError, apiError } from '../domain/errors';

export interface RateLimitOptions {
  /** Maximum requests allowed within the window. Default: 120 */
  maxRequests?: number;
  /** Window duration in milliseconds. Default: 60_000 (1 minute) */
  windowMs?: number;
  /** Clock, for tests. */
  now?: () => number;
}

export type LimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterMs: number };

/** Request timestamps per key within a moving window. */
export class SlidingWindowLimiter {
  private readonly hits = new Map<string, number[]>();

  constructor(
    readonly maxRequests: number,
    readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Record a request for `key` if the window has room. */
  hit(key: string): LimitDecision {
    const now = this.now();
    const cutoff = now - this.windowMs;
    const timestamps = (this.hits.get(key) ?? []).filter((t) => t > cutoff);

    if (timestamps.length >= this.maxRequests) {
      this.hits.set(key, timestamps);
      return { allowed: false, retryAfterMs: timestamps[0] + this.windowMs - now };
    }

    timestamps.push(now);
    this.hits.set(key, timestamps);
    return { allowed: true, remaining: this.maxRequests - timestamps.length };
  }

  /** Drop keys with no request inside the window. */
  prune(): void {
    const cutoff = this.now() - this.windowMs;
    for (const [key, timestamps] of this.hits) {
      const live = timestamps.filter((t) => t > cutoff);
      if (live.length === 0) this.hits.delete(key);
      else this.hits.set(key, live);
    }
  }

  get trackedKeys(): number {
    return this.hits.size;
  }
}

/**
 * Create a rate-limiting middleware.
 *
 * Returns 429 with a typed error when the limit is exceeded, with
 * RateLimit-Limit, RateLimit-Remaining and Retry-After headers.
 */
export function rateLimit(options?: RateLimitOptions) {
  const limiter = new SlidingWindowLimiter(
    options?.maxRequests ?? 120,
    options?.windowMs ?? 60_000,
    options?.now,
  );

  const cleanup = setInterval(() => limiter.prune(), limiter.windowMs);
  cleanup.unref();

  return (req: Request, res: Response, next: NextFunction) => {
    const decision = limiter.hit(req.ip ?? req.socket.remoteAddress ?? 'unknown');
    res.set('RateLimit-Limit', String(limiter.maxRequests));

    if (!decision.allowed) {
      const retryAfterSec = Math.ceil(decision.retryAfterMs / 1000);
      res.set('RateLimit-Remaining', '0');
      res.set('Retry-After', String(retryAfterSec));
      res.status(429).json(
        apiError(
          createTypedError({
            code: 'RATE_LIMIT.EXCEEDED',
            message: `Rate limit exceeded. Try again in ${retryAfterSec} seconds.`,
            retryable: true,
            details: { retryAfterMs: decision.retryAfterMs, limit: limiter.maxRequests, windowMs: limiter.windowMs },
          }),
        ),
      );
      return;
    }

    res.set('RateLimit-Remaining', String(decision.remaining));
    next();
  };
}
