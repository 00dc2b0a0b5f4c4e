import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ResponseCache } from './cache';
import { fingerprint, requestFingerprintInput } from './fingerprint';

export type InvalidateOptions = {
  cache: ResponseCache;
  fingerprints?: string[];
  resolveFingerprints?: (req: Request) => string[] | Promise<string[]>;
  hooks?: {
    onInvalidated?: (info: { fingerprints: string[]; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

/**
 * Drops cached responses before the handler runs. A failed invalidation never
 * fails the request; the entries simply live until their TTL.
 */
export function invalidateCache(options: InvalidateOptions): RequestHandler {
  const { cache, fingerprints, resolveFingerprints, hooks } = options;

  return async function invalidateMiddleware(req: Request, _res: Response, next: NextFunction) {
    try {
      const resolved = [...(fingerprints ?? []), ...((await resolveFingerprints?.(req)) ?? [])].filter(Boolean);
      if (resolved.length === 0) return next();

      if (await cache.invalidate(...resolved)) {
        hooks?.onInvalidated?.({ fingerprints: resolved, req });
      }
      next();
    } catch (error) {
      hooks?.onError?.({ error, req });
      next();
    }
  };
}

// Invalidates the public GET entry for the current path and query.
export function invalidateMatchingGet(options: { cache: ResponseCache }): RequestHandler {
  return invalidateCache({
    cache: options.cache,
    resolveFingerprints: (req) => [fingerprint({ ...requestFingerprintInput(req, 'public'), method: 'GET', body: undefined })],
  });
}
