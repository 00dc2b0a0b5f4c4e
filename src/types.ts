export type Clock = () => number;

export interface RateLimitStore {
  /**
   * Atomically increments the counter at `key`, setting its expiry to
   * `windowMs` when the counter is created. Must be a single operation on the
   * store: concurrent callers never observe the same post-increment value.
   */
  increment(key: string, windowMs: number): Promise<{ totalHits: number; ttlMs: number }>; // ttlMs remaining
  delete(key: string): Promise<void>;
}

export interface CacheEntry {
  body: string;
  bodyEncoding: 'utf8' | 'base64';
  statusCode: number;
  contentType: string;
  storedAt: number; // epoch ms
}

export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  /** Whole-value write; the store drops the entry once `ttlMs` has elapsed. */
  set(key: string, value: CacheEntry, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
}

export interface Pingable {
  ping(): Promise<void>;
}

/** Verified caller identity. Frozen on construction and scoped to one request. */
export type Principal = Readonly<{
  subject: string;
  issuedAt: Date;
  expiresAt: Date;
  scopes: readonly string[];
}>;

declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
      /** Aborted when the client disconnects before the response is finished. */
      signal?: AbortSignal;
    }
  }
}
