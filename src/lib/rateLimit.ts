import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Clock, RateLimitStore } from '../types';
import { RateLimitError, RateLimitUnavailableError, errorMessage } from './errors';
import { keyByPrincipal, type KeyGenerator } from './keys';
import { logger as defaultLogger, type Logger } from './logger';
import { AbortedError, withTimeout } from './timeout';

export type FailurePolicy = 'open' | 'closed';

export type RateDecision =
  | { admitted: true; count: number; limit: number; remaining: number; resetSeconds: number; degraded: boolean }
  | { admitted: false; count: number; limit: number; retryAfterSeconds: number };

export type RateLimiterOptions = {
  store: RateLimitStore;
  prefix?: string;
  /** Upper bound on one store round-trip. */
  timeoutMs?: number;
  /** What to do when the store cannot answer in time: admit (`open`) or refuse (`closed`). */
  onStoreFailure?: FailurePolicy;
  now?: Clock;
  logger?: Logger;
};

/**
 * Fixed-window limiter. Each call increments the counter of the current
 * window bucket, `floor(now / window)`, and compares the post-increment count
 * with the limit. Rejected calls stay counted. Bursts of up to twice the
 * limit are possible across a window boundary.
 */
export class RateLimiter {
  private readonly store: RateLimitStore;
  private readonly prefix: string;
  private readonly timeoutMs: number;
  private readonly policy: FailurePolicy;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(options: RateLimiterOptions) {
    this.store = options.store;
    this.prefix = options.prefix ?? 'rl';
    this.timeoutMs = options.timeoutMs ?? 250;
    this.policy = options.onStoreFailure ?? 'open';
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
  }

  async admit(key: string, limit: number, windowSeconds: number, signal?: AbortSignal): Promise<RateDecision> {
    if (!Number.isInteger(limit) || limit < 1) throw new RangeError(`limit must be a positive integer, got ${limit}`);
    if (!Number.isInteger(windowSeconds) || windowSeconds < 1) {
      throw new RangeError(`windowSeconds must be a positive integer, got ${windowSeconds}`);
    }

    const now = this.now();
    const windowMs = windowSeconds * 1000;
    const bucket = Math.floor(now / windowMs);
    const secondsLeft = Math.max(1, Math.ceil(((bucket + 1) * windowMs - now) / 1000));

    let totalHits: number;
    try {
      ({ totalHits } = await withTimeout(this.store.increment(this.bucketKey(key, bucket), windowMs), this.timeoutMs, signal));
    } catch (error) {
      if (error instanceof AbortedError) throw error;
      this.logger.warn({ key, policy: this.policy, err: errorMessage(error) }, 'rate limit store unavailable');
      if (this.policy === 'closed') {
        throw new RateLimitUnavailableError('rate limit store unavailable', { cause: error });
      }
      return { admitted: true, count: 0, limit, remaining: limit, resetSeconds: secondsLeft, degraded: true };
    }

    if (totalHits > limit) {
      return { admitted: false, count: totalHits, limit, retryAfterSeconds: secondsLeft };
    }
    return {
      admitted: true,
      count: totalHits,
      limit,
      remaining: limit - totalHits,
      resetSeconds: secondsLeft,
      degraded: false,
    };
  }

  /** Clears the caller's counter for the current window. */
  async reset(key: string, windowSeconds: number): Promise<void> {
    const windowMs = windowSeconds * 1000;
    await withTimeout(this.store.delete(this.bucketKey(key, Math.floor(this.now() / windowMs))), this.timeoutMs);
  }

  private bucketKey(key: string, bucket: number): string {
    return `${this.prefix}:${key}:${bucket}`;
  }
}

export type RateLimitOptions = {
  limiter: RateLimiter;
  requests: number;
  window: number; // seconds
  keyGenerator?: KeyGenerator;
  hooks?: {
    onAdmitted?: (info: { key: string; totalHits: number; remaining: number; req: Request }) => void;
    onRejected?: (info: { key: string; totalHits: number; retryAfterSeconds: number; req: Request }) => void;
  };
};

export function rateLimit(options: RateLimitOptions): RequestHandler {
  const { limiter, requests, window, keyGenerator = keyByPrincipal(), hooks } = options;

  return async function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
    const key = keyGenerator(req);
    try {
      const decision = await limiter.admit(key, requests, window, req.signal);

      res.setHeader('X-RateLimit-Limit', String(requests));
      if (!decision.admitted) {
        res.setHeader('X-RateLimit-Remaining', '0');
        res.setHeader('X-RateLimit-Reset', String(decision.retryAfterSeconds));
        res.setHeader('Retry-After', String(decision.retryAfterSeconds));
        hooks?.onRejected?.({ key, totalHits: decision.count, retryAfterSeconds: decision.retryAfterSeconds, req });
        const rejection = new RateLimitError(decision.retryAfterSeconds);
        res.status(rejection.status).json({ error: rejection.category, kind: rejection.kind, retryAfter: rejection.retryAfterSeconds });
        return;
      }

      res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
      res.setHeader('X-RateLimit-Reset', String(decision.resetSeconds));
      hooks?.onAdmitted?.({ key, totalHits: decision.count, remaining: decision.remaining, req });
      next();
    } catch (error) {
      next(error);
    }
  };
}
