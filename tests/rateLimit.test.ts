import express from 'express';
import request from 'supertest';
import { rateLimit, RateLimiter, type RateDecision } from '../src/lib/rateLimit';
import { errorHandler } from '../src/lib/errorHandler';
import { keyByHeader } from '../src/lib/keys';
import { createLogger } from '../src/lib/logger';
import { MemoryStore } from '../src/stores/memoryStore';
import { NOW } from './support/tokens';

const silent = createLogger({ level: 'silent' });

describe('RateLimiter', () => {
  test('admits up to the limit and rejects the next call', async () => {
    const store = new MemoryStore({ now: () => NOW });
    const limiter = new RateLimiter({ store, now: () => NOW, logger: silent });

    const decisions: RateDecision[] = [];
    for (let i = 0; i < 4; i++) decisions.push(await limiter.admit('user-1', 3, 60));

    expect(decisions.map((d) => d.admitted)).toEqual([true, true, true, false]);
    expect(decisions[0]).toEqual({ admitted: true, count: 1, limit: 3, remaining: 2, resetSeconds: 60, degraded: false });
    expect(decisions[3]).toEqual({ admitted: false, count: 4, limit: 3, retryAfterSeconds: 60 });
  });

  test('concurrent calls never admit more than the limit', async () => {
    const store = new MemoryStore({ now: () => NOW });
    const limiter = new RateLimiter({ store, now: () => NOW, logger: silent });

    const decisions = await Promise.all(Array.from({ length: 10 }, () => limiter.admit('burst', 5, 60)));

    expect(decisions.filter((d) => d.admitted)).toHaveLength(5);
    expect(decisions.map((d) => d.count).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  test('keys are limited independently', async () => {
    const store = new MemoryStore({ now: () => NOW });
    const limiter = new RateLimiter({ store, now: () => NOW, logger: silent });

    await limiter.admit('a', 1, 60);
    expect((await limiter.admit('a', 1, 60)).admitted).toBe(false);
    expect((await limiter.admit('b', 1, 60)).admitted).toBe(true);
  });

  test('a new window starts a new count', async () => {
    let clock = NOW + 59_000;
    const store = new MemoryStore({ now: () => clock });
    const limiter = new RateLimiter({ store, now: () => clock, logger: silent });

    await limiter.admit('user-1', 1, 60);
    const rejected = await limiter.admit('user-1', 1, 60);
    expect(rejected).toEqual({ admitted: false, count: 2, limit: 1, retryAfterSeconds: 1 });

    clock = NOW + 60_000;
    expect(await limiter.admit('user-1', 1, 60)).toMatchObject({ admitted: true, count: 1, resetSeconds: 60 });
  });

  test('retry-after rounds up to whole seconds', async () => {
    const clock = NOW + 59_500;
    const limiter = new RateLimiter({ store: new MemoryStore({ now: () => clock }), now: () => clock, logger: silent });

    await limiter.admit('user-1', 1, 60);
    expect(await limiter.admit('user-1', 1, 60)).toMatchObject({ admitted: false, retryAfterSeconds: 1 });
  });

  test('rejects non-positive limits and windows', async () => {
    const limiter = new RateLimiter({ store: new MemoryStore(), logger: silent });
    await expect(limiter.admit('k', 0, 60)).rejects.toThrow(RangeError);
    await expect(limiter.admit('k', 1, 0)).rejects.toThrow(RangeError);
    await expect(limiter.admit('k', 1.5, 60)).rejects.toThrow(RangeError);
  });

  test('reset clears the current window', async () => {
    const store = new MemoryStore({ now: () => NOW });
    const limiter = new RateLimiter({ store, now: () => NOW, logger: silent });

    await limiter.admit('user-1', 1, 60);
    await limiter.reset('user-1', 60);
    expect(await limiter.admit('user-1', 1, 60)).toMatchObject({ admitted: true, count: 1 });
  });

  test('an aborted caller is not counted as a decision', async () => {
    const limiter = new RateLimiter({ store: new MemoryStore(), logger: silent });
    const controller = new AbortController();
    controller.abort();
    await expect(limiter.admit('k', 1, 60, controller.signal)).rejects.toThrow('operation aborted');
  });
});

describe('rateLimit middleware', () => {
  function appWith(limiter: RateLimiter, requests: number) {
    const app = express();
    app.use(rateLimit({ limiter, requests, window: 60 }));
    app.get('/', (_req, res) => res.send('ok'));
    app.use(errorHandler(silent));
    return app;
  }

  test('allows up to N requests within window', async () => {
    const limiter = new RateLimiter({ store: new MemoryStore({ now: () => NOW }), now: () => NOW, logger: silent });
    const app = appWith(limiter, 2);

    const r1 = await request(app).get('/');
    const r2 = await request(app).get('/');
    const r3 = await request(app).get('/');

    expect(r1.status).toBe(200);
    expect(r2.status).toBe(200);
    expect(r3.status).toBe(429);
  });

  test('sets rate limit headers', async () => {
    const limiter = new RateLimiter({ store: new MemoryStore({ now: () => NOW }), now: () => NOW, logger: silent });
    const app = appWith(limiter, 2);

    const ok = await request(app).get('/');
    expect(ok.headers['x-ratelimit-limit']).toBe('2');
    expect(ok.headers['x-ratelimit-remaining']).toBe('1');
    expect(ok.headers['x-ratelimit-reset']).toBe('60');

    await request(app).get('/');
    const rejected = await request(app).get('/');
    expect(rejected.headers['x-ratelimit-remaining']).toBe('0');
    expect(rejected.headers['retry-after']).toBe('60');
    expect(rejected.body).toEqual({ error: 'rate_limited', kind: 'Rejected', retryAfter: 60 });
  });

  test('uses the key generator', async () => {
    const limiter = new RateLimiter({ store: new MemoryStore(), logger: silent });
    const app = express();
    app.use(rateLimit({ limiter, requests: 1, window: 60, keyGenerator: keyByHeader('x-api-key') }));
    app.get('/', (_req, res) => res.send('ok'));

    expect((await request(app).get('/').set('x-api-key', 'alpha')).status).toBe(200);
    expect((await request(app).get('/').set('x-api-key', 'alpha')).status).toBe(429);
    expect((await request(app).get('/').set('x-api-key', 'beta')).status).toBe(200);
  });

  test('hooks see admitted and rejected calls', async () => {
    const limiter = new RateLimiter({ store: new MemoryStore(), logger: silent });
    const events: string[] = [];
    const app = express();
    app.use(
      rateLimit({
        limiter,
        requests: 1,
        window: 60,
        keyGenerator: () => 'fixed',
        hooks: {
          onAdmitted: ({ key, totalHits, remaining }) => events.push(`admitted:${key}:${totalHits}:${remaining}`),
          onRejected: ({ key, totalHits }) => events.push(`rejected:${key}:${totalHits}`),
        },
      }),
    );
    app.get('/', (_req, res) => res.send('ok'));

    await request(app).get('/');
    await request(app).get('/');
    expect(events).toEqual(['admitted:fixed:1:0', 'rejected:fixed:2']);
  });
});
