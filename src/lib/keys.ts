import type { Request } from 'express';
import type { Principal } from '../types';

export type KeyGenerator = (req: Request) => string;

function clientAddress(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

export function keyByIp(options?: { prefix?: string }): KeyGenerator {
  const prefix = options?.prefix ?? 'ip';
  return (req: Request) => `${prefix}:${clientAddress(req)}`;
}

/** Authenticated callers share a budget per subject; anonymous ones per client address. */
export function keyByPrincipal(options?: { prefix?: string; anonymousPrefix?: string }): KeyGenerator {
  const prefix = options?.prefix ?? 'sub';
  const anonymousPrefix = options?.anonymousPrefix ?? 'ip';
  return (req: Request) => {
    const principal: Principal | undefined = req.principal;
    if (principal) return `${prefix}:${principal.subject}`;
    return `${anonymousPrefix}:${clientAddress(req)}`;
  };
}

export function keyByHeader(
  headerName: string = 'x-api-key',
  options?: { fallbackToIp?: boolean; prefix?: string },
): KeyGenerator {
  const normalized = headerName.toLowerCase();
  const prefix = options?.prefix ?? 'token';
  return (req: Request) => {
    const headerValue = req.header(normalized);
    if (typeof headerValue === 'string' && headerValue.length > 0) {
      return `${prefix}:${headerValue}`;
    }
    if (options?.fallbackToIp) {
      return `${prefix}-ip:${clientAddress(req)}`;
    }
    return `${prefix}:anonymous`;
  };
}
