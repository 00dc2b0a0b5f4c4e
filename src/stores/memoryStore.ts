import type { CacheEntry, CacheStore, Clock, Pingable, RateLimitStore } from '../types';

type Counter = {
  count: number;
  expiresAt: number; // timestamp ms
};

/**
 * Single-process store for development and tests. Each operation runs to
 * completion on the event loop without awaiting, which is what makes
 * `increment` atomic here; production deployments share a `RedisStore`.
 */
export class MemoryStore implements RateLimitStore, CacheStore, Pingable {
  private readonly counters = new Map<string, Counter>();
  private readonly cache = new Map<string, { entry: CacheEntry; expiresAt: number }>();
  private readonly now: Clock;
  private nextPruneAt = 0;

  constructor(options: { now?: Clock } = {}) {
    this.now = options.now ?? Date.now;
  }

  async increment(key: string, windowMs: number): Promise<{ totalHits: number; ttlMs: number }> {
    const now = this.now();
    // Window keys change every bucket; drop dead counters at most once per window.
    if (now >= this.nextPruneAt) {
      this.pruneCounters(now);
      this.nextPruneAt = now + windowMs;
    }
    const record = this.counters.get(key);
    if (!record || record.expiresAt <= now) {
      const expiresAt = now + windowMs;
      this.counters.set(key, { count: 1, expiresAt });
      return { totalHits: 1, ttlMs: expiresAt - now };
    }
    record.count += 1;
    return { totalHits: record.count, ttlMs: record.expiresAt - now };
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const record = this.cache.get(key);
    if (!record) return undefined;
    if (record.expiresAt <= this.now()) {
      this.cache.delete(key);
      return undefined;
    }
    return { ...record.entry };
  }

  async set(key: string, value: CacheEntry, ttlMs: number): Promise<void> {
    this.cache.set(key, { entry: { ...value }, expiresAt: this.now() + ttlMs });
  }

  async delete(key: string): Promise<void> {
    this.counters.delete(key);
    this.cache.delete(key);
  }

  async ping(): Promise<void> {}

  /** Drops expired counters and entries. Counters are also pruned from `increment`. */
  sweep(): void {
    const now = this.now();
    this.pruneCounters(now);
    for (const [key, record] of this.cache) {
      if (record.expiresAt <= now) this.cache.delete(key);
    }
  }

  private pruneCounters(now: number): void {
    for (const [key, counter] of this.counters) {
      if (counter.expiresAt <= now) this.counters.delete(key);
    }
  }

  get size(): { counters: number; entries: number } {
    return { counters: this.counters.size, entries: this.cache.size };
  }
}
