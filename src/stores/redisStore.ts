import type Redis from 'ioredis';
import { z } from 'zod';
import type { CacheEntry, CacheStore, Pingable, RateLimitStore } from '../types';

// INCR and the first-hit expiry run as one script so no other client can
// interleave; a counter that somehow lost its TTL gets it back.
const INCREMENT_SCRIPT = `
local hits = redis.call('INCR', KEYS[1])
if hits == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
local ttl = redis.call('PTTL', KEYS[1])
if ttl < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
  ttl = tonumber(ARGV[1])
end
return { hits, ttl }
`;

const cacheEntrySchema = z.object({
  body: z.string(),
  bodyEncoding: z.enum(['utf8', 'base64']),
  statusCode: z.number().int(),
  contentType: z.string(),
  storedAt: z.number(),
});

export class RedisStore implements RateLimitStore, CacheStore, Pingable {
  constructor(private readonly client: Redis) {}

  async increment(key: string, windowMs: number): Promise<{ totalHits: number; ttlMs: number }> {
    const reply = await this.client.eval(INCREMENT_SCRIPT, 1, key, String(windowMs));
    if (!Array.isArray(reply) || reply.length !== 2) {
      throw new Error(`unexpected reply from rate limit script for ${key}`);
    }
    const totalHits = Number(reply[0]);
    const ttlMs = Number(reply[1]);
    if (!Number.isFinite(totalHits) || !Number.isFinite(ttlMs)) {
      throw new Error(`non-numeric reply from rate limit script for ${key}`);
    }
    return { totalHits, ttlMs };
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const raw = await this.client.get(key);
    if (raw === null) return undefined;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return undefined;
    }
    const result = cacheEntrySchema.safeParse(parsed);
    return result.success ? result.data : undefined;
  }

  async set(key: string, value: CacheEntry, ttlMs: number): Promise<void> {
    await this.client.set(key, JSON.stringify(value), 'PX', Math.max(1, Math.ceil(ttlMs)));
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }
}
