import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Principal } from '../types';
import { authenticate, requireScopes, type TokenVerifier } from './auth';
import { cache, type ResponseCache } from './cache';
import type { CacheScope, FingerprintInput } from './fingerprint';
import type { KeyGenerator } from './keys';
import { rateLimit, type RateLimiter } from './rateLimit';

/**
 * Attaches `req.signal`, aborted when the client disconnects before the
 * response has finished. Every suspension point downstream takes it.
 */
export function requestContext(): RequestHandler {
  return function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
    const controller = new AbortController();
    req.signal = controller.signal;
    res.once('close', () => {
      if (!res.writableFinished) controller.abort();
    });
    next();
  };
}

export type RouteCacheOptions = {
  ttl?: number; // seconds
  scope?: CacheScope;
  fingerprint?: (req: Request) => FingerprintInput;
};

export type RouteOptions = {
  /** `required` (default) rejects anonymous callers, `optional` lets them through. `none` skips verification. */
  auth?: 'required' | 'optional' | 'none';
  scopes?: string[];
  /** `false` skips the limiter for this route. */
  rateLimit?: false | { requests?: number; window?: number; keyGenerator?: KeyGenerator };
  /** Caching is opt-in: omitted means the route is never cached. */
  cache?: true | RouteCacheOptions;
};

export type PipelineOptions = {
  verifier: TokenVerifier;
  /** Absent when rate limiting is switched off. */
  limiter?: RateLimiter;
  /** Absent when caching is switched off. */
  responseCache?: ResponseCache;
  defaults?: { requests?: number; window?: number; cacheTtl?: number };
};

export type Pipeline = {
  route(options?: RouteOptions): RequestHandler[];
};

/**
 * Builds per-route handler chains in a fixed order:
 * authenticate, requireScopes, rateLimit, cache. The route's own handler goes
 * after them. Each stage may answer the request itself and stop the chain.
 */
export function createPipeline(options: PipelineOptions): Pipeline {
  const { verifier, limiter, responseCache, defaults = {} } = options;
  const { requests = 100, window = 60, cacheTtl = responseCache?.defaultTtlSeconds ?? 300 } = defaults;

  return {
    route(route: RouteOptions = {}) {
      const { auth = 'required', scopes = [], rateLimit: limits = {}, cache: caching } = route;
      const chain: RequestHandler[] = [];

      if (auth !== 'none') {
        chain.push(authenticate({ verifier, optional: auth === 'optional' }));
      }
      if (auth === 'required' || scopes.length > 0) {
        chain.push(requireScopes(verifier, ...scopes));
      }
      if (limiter && limits !== false) {
        chain.push(
          rateLimit({
            limiter,
            requests: limits.requests ?? requests,
            window: limits.window ?? window,
            keyGenerator: limits.keyGenerator,
          }),
        );
      }
      if (responseCache && caching) {
        const settings: RouteCacheOptions = caching === true ? {} : caching;
        chain.push(
          cache({
            cache: responseCache,
            ttl: settings.ttl ?? cacheTtl,
            scope: settings.scope ?? (auth === 'required' ? 'principal' : 'public'),
            fingerprint: settings.fingerprint,
          }),
        );
      }
      return chain;
    },
  };
}

/** The verified principal of an authenticated route; throws if the chain did not authenticate. */
export function principalOf(req: Request): Principal {
  const principal: Principal | undefined = req.principal;
  if (!principal) throw new TypeError('route is not authenticated');
  return principal;
}
