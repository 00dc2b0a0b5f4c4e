import { createHash } from 'node:crypto';
import type { Request } from 'express';
import type { Principal } from '../types';

export type FingerprintInput = {
  method: string;
  path: string;
  query?: unknown;
  body?: unknown;
  /** Subject of the caller, for responses that differ per principal. */
  principal?: string;
};

export function normalizePath(path: string): string {
  const collapsed = `/${path}`.replace(/\/{2,}/g, '/');
  return collapsed.length > 1 ? collapsed.replace(/\/+$/, '') : collapsed;
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, canonicalize(v)]),
    );
  }
  return value;
}

// Repeated parameters are compared as sets: ?tag=a&tag=b matches ?tag=b&tag=a.
function canonicalQuery(query: unknown): unknown {
  const canonical = canonicalize(query ?? {});
  if (canonical === null || typeof canonical !== 'object' || Array.isArray(canonical)) return {};
  return Object.fromEntries(
    Object.entries(canonical).map(([key, value]) => [
      key,
      Array.isArray(value) ? value.map((item) => JSON.stringify(item)).sort() : value,
    ]),
  );
}

/**
 * Deterministic cache key for a request: SHA-256 over the canonical form of
 * method, path, query, body and (when given) principal. Parameter order never
 * changes the result.
 */
export function fingerprint(input: FingerprintInput): string {
  const canonical = JSON.stringify([
    input.method.toUpperCase(),
    normalizePath(input.path),
    canonicalQuery(input.query),
    input.body === undefined ? null : canonicalize(input.body),
    input.principal ?? null,
  ]);
  return createHash('sha256').update(canonical).digest('hex');
}

export type CacheScope = 'public' | 'principal';

export function requestFingerprintInput(req: Request, scope: CacheScope): FingerprintInput {
  const hasBody = req.body !== undefined && !(typeof req.body === 'object' && req.body !== null && Object.keys(req.body).length === 0);
  const principal: Principal | undefined = req.principal;
  return {
    method: req.method,
    // req.path is relative to the router's mount point
    path: req.baseUrl + req.path,
    query: req.query,
    body: hasBody ? req.body : undefined,
    principal: scope === 'principal' ? principal?.subject : undefined,
  };
}
