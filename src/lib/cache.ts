import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { CacheEntry, CacheStore, Clock, Principal } from '../types';
import { CacheError, errorMessage } from './errors';
import { fingerprint as fingerprintOf, requestFingerprintInput, type CacheScope, type FingerprintInput } from './fingerprint';
import { logger as defaultLogger, type Logger } from './logger';
import { withTimeout } from './timeout';

export type CachedResponse = {
  body: Buffer;
  statusCode: number;
  contentType: string;
  storedAt: Date;
};

export type ResponseCacheOptions = {
  store: CacheStore;
  defaultTtlSeconds?: number;
  prefix?: string;
  timeoutMs?: number;
  now?: Clock;
  logger?: Logger;
};

/**
 * Best-effort response cache over a shared store. Failures never reach the
 * caller: reads degrade to a miss, writes and deletes are logged.
 *
 * There is no dependency tracking. Code that mutates data behind a cached
 * response must invalidate the affected fingerprints itself, otherwise the
 * old response is served until its TTL runs out.
 */
export class ResponseCache {
  readonly defaultTtlSeconds: number;
  private readonly store: CacheStore;
  private readonly prefix: string;
  private readonly timeoutMs: number;
  private readonly now: Clock;
  readonly logger: Logger;

  constructor(options: ResponseCacheOptions) {
    this.store = options.store;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? 300;
    this.prefix = options.prefix ?? 'cache';
    this.timeoutMs = options.timeoutMs ?? 250;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
  }

  async get(fingerprint: string, signal?: AbortSignal): Promise<CachedResponse | undefined> {
    let entry: CacheEntry | undefined;
    try {
      entry = await withTimeout(this.store.get(this.key(fingerprint)), this.timeoutMs, signal);
    } catch (error) {
      this.report(new CacheError(`cache read failed: ${errorMessage(error)}`, { cause: error }), fingerprint);
      return undefined;
    }
    if (!entry) return undefined;
    return {
      body: Buffer.from(entry.body, entry.bodyEncoding),
      statusCode: entry.statusCode,
      contentType: entry.contentType,
      storedAt: new Date(entry.storedAt),
    };
  }

  /** Resolves once the write settles; never rejects. */
  async put(
    fingerprint: string,
    response: { body: Buffer | string; statusCode: number; contentType: string },
    ttlSeconds: number = this.defaultTtlSeconds,
  ): Promise<boolean> {
    const entry: CacheEntry =
      typeof response.body === 'string'
        ? { body: response.body, bodyEncoding: 'utf8', statusCode: response.statusCode, contentType: response.contentType, storedAt: this.now() }
        : {
            body: response.body.toString('base64'),
            bodyEncoding: 'base64',
            statusCode: response.statusCode,
            contentType: response.contentType,
            storedAt: this.now(),
          };
    try {
      await withTimeout(this.store.set(this.key(fingerprint), entry, ttlSeconds * 1000), this.timeoutMs);
      return true;
    } catch (error) {
      this.report(new CacheError(`cache write failed: ${errorMessage(error)}`, { cause: error }), fingerprint);
      return false;
    }
  }

  async invalidate(...fingerprints: string[]): Promise<boolean> {
    try {
      await withTimeout(Promise.all(fingerprints.map((f) => this.store.delete(this.key(f)))), this.timeoutMs);
      return true;
    } catch (error) {
      this.logger.error({ fingerprints, err: errorMessage(error) }, 'cache invalidation failed; entries stay until their TTL');
      return false;
    }
  }

  private key(fingerprint: string): string {
    return `${this.prefix}:${fingerprint}`;
  }

  private report(error: CacheError, fingerprint: string): void {
    this.logger.warn({ fingerprint, kind: error.kind, err: error.message }, 'cache unavailable');
  }
}

export type CacheOptions = {
  cache: ResponseCache;
  ttl?: number; // seconds
  /** `principal` keys entries by caller so responses never cross principals. */
  scope?: CacheScope;
  fingerprint?: (req: Request) => FingerprintInput;
  shouldBypass?: (req: Request) => boolean;
  hooks?: {
    onHit?: (info: { fingerprint: string; req: Request }) => void;
    onMiss?: (info: { fingerprint: string; req: Request }) => void;
    onCacheSet?: (info: { fingerprint: string; req: Request; statusCode: number }) => void;
  };
};

function contentTypeOf(res: Response): string {
  const header = res.getHeader('Content-Type');
  if (typeof header === 'string') return header;
  if (Array.isArray(header)) return header.join(', ');
  return 'application/octet-stream';
}

export function cache(options: CacheOptions): RequestHandler {
  const { cache: responseCache, ttl = responseCache.defaultTtlSeconds, scope = 'public', shouldBypass, hooks } = options;
  const inputOf = options.fingerprint ?? ((req: Request) => requestFingerprintInput(req, scope));

  return async function cacheMiddleware(req: Request, res: Response, next: NextFunction) {
    const principal: Principal | undefined = req.principal;
    if (scope === 'principal' && !principal) return next();
    if (shouldBypass?.(req)) return next();

    try {
      const fingerprint = fingerprintOf(inputOf(req));

      const cached = await responseCache.get(fingerprint, req.signal);
      if (cached) {
        res.setHeader('X-Cache', 'HIT');
        res.setHeader('Content-Type', cached.contentType);
        res.status(cached.statusCode).send(cached.body);
        hooks?.onHit?.({ fingerprint, req });
        return;
      }
      hooks?.onMiss?.({ fingerprint, req });

      let captured = false;
      const originalSend = res.send.bind(res);
      res.send = (body?: unknown) => {
        // res.json and res.send(object) re-enter here with the serialized body
        if (captured) return originalSend(body);
        captured = true;
        res.setHeader('X-Cache', 'MISS');
        const result = originalSend(body);

        const statusCode = res.statusCode;
        if (statusCode >= 200 && statusCode < 300 && body !== undefined) {
          const payload = Buffer.isBuffer(body) || typeof body === 'string' ? body : JSON.stringify(body);
          // Fire-and-forget: a slow or failing store never delays the response.
          void responseCache
            .put(fingerprint, { body: payload, statusCode, contentType: contentTypeOf(res) }, ttl)
            .then((stored) => {
              if (stored) hooks?.onCacheSet?.({ fingerprint, req, statusCode });
            })
            .catch((error: unknown) => {
              responseCache.logger.error({ fingerprint, err: errorMessage(error) }, 'onCacheSet hook failed');
            });
        }
        return result;
      };

      next();
    } catch (error) {
      next(error);
    }
  };
}
