export type AuthErrorKind = 'Missing' | 'Malformed' | 'Expired' | 'InvalidSignature' | 'NotYetValid';
export type DataErrorKind = 'NotFound' | 'Conflict' | 'ConnectionLost' | 'Timeout' | 'Cancelled' | 'Other';
export type StorageErrorKind = 'Unreachable' | 'NotFound' | 'PermissionDenied';

/**
 * Base for every error the pipeline knows how to turn into an HTTP response.
 * `category` and `kind` are what clients see; `message` stays in the logs.
 */
export abstract class ApiError extends Error {
  abstract readonly status: number;
  abstract readonly category: string;
  abstract readonly kind: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthError extends ApiError {
  readonly status = 401;
  readonly category = 'unauthorized';

  constructor(readonly kind: AuthErrorKind, message: string = `authentication failed: ${kind}`, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ForbiddenError extends ApiError {
  readonly status = 403;
  readonly category = 'forbidden';
  readonly kind = 'InsufficientScope';

  constructor(readonly missingScopes: readonly string[]) {
    super(`missing scopes: ${missingScopes.join(', ')}`);
  }
}

export class RateLimitError extends ApiError {
  readonly status = 429;
  readonly category = 'rate_limited';
  readonly kind = 'Rejected';

  constructor(readonly retryAfterSeconds: number) {
    super(`rate limit exceeded, retry after ${retryAfterSeconds}s`);
  }
}

/** Raised only under the `closed` failure policy when the counter store cannot answer. */
export class RateLimitUnavailableError extends ApiError {
  readonly status = 503;
  readonly category = 'rate_limit_unavailable';
  readonly kind = 'StoreUnavailable';
}

const DATA_STATUS: Record<DataErrorKind, number> = {
  NotFound: 404,
  Conflict: 409,
  ConnectionLost: 503,
  Timeout: 503,
  Cancelled: 503,
  Other: 500,
};

export class DataError extends ApiError {
  readonly category = 'data_error';

  constructor(readonly kind: DataErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  get status(): number {
    return DATA_STATUS[this.kind];
  }

  /** Transient failures worth one more attempt when acquiring a connection. */
  get transient(): boolean {
    return this.kind === 'ConnectionLost' || this.kind === 'Timeout';
  }
}

// Never leaves the cache: logged and treated as a miss.
export class CacheError extends Error {
  readonly kind = 'Unreachable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheError';
  }
}

const STORAGE_STATUS: Record<StorageErrorKind, number> = {
  Unreachable: 502,
  NotFound: 404,
  PermissionDenied: 500,
};

export class StorageError extends ApiError {
  readonly category = 'storage_error';

  constructor(readonly kind: StorageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  get status(): number {
    return STORAGE_STATUS[this.kind];
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const { code } = error;
  if (typeof code === 'string') return code;
  if (typeof code === 'number') return String(code);
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
