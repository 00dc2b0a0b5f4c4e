import express from 'express';
import request from 'supertest';
import { cache, ResponseCache } from '../src/lib/cache';
import { createLogger } from '../src/lib/logger';
import { MemoryStore } from '../src/stores/memoryStore';
import type { CacheStore } from '../src/types';
import { NOW } from './support/tokens';

const silent = createLogger({ level: 'silent' });

describe('cache middleware', () => {
  test('caches GET responses', async () => {
    const app = express();
    const responseCache = new ResponseCache({ store: new MemoryStore(), logger: silent });
    let calls = 0;
    app.use(cache({ cache: responseCache, ttl: 60 }));
    app.get('/data', (_req, res) => res.json({ n: ++calls }));

    const r1 = await request(app).get('/data');
    const r2 = await request(app).get('/data');

    expect(r1.headers['x-cache']).toBe('MISS');
    expect(r2.headers['x-cache']).toBe('HIT');
    expect(r2.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(r1.body).toEqual({ n: 1 });
    expect(r2.body).toEqual({ n: 1 });
    expect(calls).toBe(1);
  });

  test('query parameter order does not matter', async () => {
    const app = express();
    let calls = 0;
    app.use(cache({ cache: new ResponseCache({ store: new MemoryStore(), logger: silent }) }));
    app.get('/items', (_req, res) => res.json({ n: ++calls }));

    await request(app).get('/items?a=1&b=2');
    const res = await request(app).get('/items?b=2&a=1');

    expect(res.headers['x-cache']).toBe('HIT');
    expect(calls).toBe(1);
  });

  test('routers mounted at different prefixes keep separate entries', async () => {
    const app = express();
    const responseCache = new ResponseCache({ store: new MemoryStore(), logger: silent });
    for (const version of [1, 2]) {
      const router = express.Router();
      router.get('/items', cache({ cache: responseCache, ttl: 60 }), (_req, res) => res.json({ version }));
      app.use(`/api/v${version}`, router);
    }

    await request(app).get('/api/v1/items');
    const v2 = await request(app).get('/api/v2/items');
    const v1 = await request(app).get('/api/v1/items');

    expect(v2.headers['x-cache']).toBe('MISS');
    expect(v2.body).toEqual({ version: 2 });
    expect(v1.headers['x-cache']).toBe('HIT');
    expect(v1.body).toEqual({ version: 1 });
  });

  test('entries expire after their TTL', async () => {
    let clock = NOW;
    const app = express();
    let calls = 0;
    app.use(cache({ cache: new ResponseCache({ store: new MemoryStore({ now: () => clock }), logger: silent }), ttl: 10 }));
    app.get('/data', (_req, res) => res.json({ n: ++calls }));

    await request(app).get('/data');
    clock = NOW + 9_999;
    expect((await request(app).get('/data')).headers['x-cache']).toBe('HIT');
    clock = NOW + 10_000;
    const expired = await request(app).get('/data');

    expect(expired.headers['x-cache']).toBe('MISS');
    expect(expired.body).toEqual({ n: 2 });
  });

  test('non-2xx responses are not stored', async () => {
    const app = express();
    let calls = 0;
    app.use(cache({ cache: new ResponseCache({ store: new MemoryStore(), logger: silent }) }));
    app.get('/missing', (_req, res) => res.status(404).json({ n: ++calls }));

    await request(app).get('/missing');
    const res = await request(app).get('/missing');

    expect(res.status).toBe(404);
    expect(res.headers['x-cache']).toBe('MISS');
    expect(calls).toBe(2);
  });

  test('keeps status and content type of text responses', async () => {
    const app = express();
    app.use(cache({ cache: new ResponseCache({ store: new MemoryStore(), logger: silent }) }));
    app.get('/page', (_req, res) => res.status(203).type('html').send('<p>hi</p>'));

    await request(app).get('/page');
    const res = await request(app).get('/page');

    expect(res.headers['x-cache']).toBe('HIT');
    expect(res.status).toBe(203);
    expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(res.text).toBe('<p>hi</p>');
  });

  test('binary bodies survive the round trip', async () => {
    const app = express();
    app.use(cache({ cache: new ResponseCache({ store: new MemoryStore(), logger: silent }) }));
    app.get('/pixel', (_req, res) => res.type('png').send(Buffer.from([0x89, 0x50, 0x4e, 0x47])));

    await request(app).get('/pixel');
    const res = await request(app).get('/pixel');

    expect(res.headers['x-cache']).toBe('HIT');
    expect(res.headers['content-type']).toBe('image/png');
    expect(res.body).toEqual(Buffer.from([0x89, 0x50, 0x4e, 0x47]));
  });

  test('a failing store degrades to serving uncached', async () => {
    const broken: CacheStore = {
      get: async () => {
        throw new Error('connection reset');
      },
      set: async () => {
        throw new Error('connection reset');
      },
      delete: async () => undefined,
    };
    const app = express();
    let calls = 0;
    app.use(cache({ cache: new ResponseCache({ store: broken, logger: silent }) }));
    app.get('/data', (_req, res) => res.json({ n: ++calls }));

    const r1 = await request(app).get('/data');
    const r2 = await request(app).get('/data');

    expect(r1.status).toBe(200);
    expect(r2.status).toBe(200);
    expect(r2.body).toEqual({ n: 2 });
  });

  test('a store that does not answer in time is a miss', async () => {
    const hanging: CacheStore = {
      get: () => new Promise(() => undefined),
      set: () => new Promise(() => undefined),
      delete: async () => undefined,
    };
    const app = express();
    app.use(cache({ cache: new ResponseCache({ store: hanging, timeoutMs: 20, logger: silent }) }));
    app.get('/data', (_req, res) => res.json({ ok: true }));

    const res = await request(app).get('/data');
    expect(res.status).toBe(200);
    expect(res.headers['x-cache']).toBe('MISS');
  });
});

describe('ResponseCache', () => {
  test('get returns what put stored', async () => {
    const responseCache = new ResponseCache({ store: new MemoryStore({ now: () => NOW }), now: () => NOW, logger: silent });

    expect(await responseCache.put('fp', { body: '{"a":1}', statusCode: 200, contentType: 'application/json' })).toBe(true);
    const cached = await responseCache.get('fp');

    expect(cached?.body.toString('utf8')).toBe('{"a":1}');
    expect(cached?.statusCode).toBe(200);
    expect(cached?.contentType).toBe('application/json');
    expect(cached?.storedAt).toEqual(new Date(NOW));
  });

  test('uses the default TTL when none is given', async () => {
    let clock = NOW;
    const store = new MemoryStore({ now: () => clock });
    const responseCache = new ResponseCache({ store, defaultTtlSeconds: 5, logger: silent });

    await responseCache.put('fp', { body: 'x', statusCode: 200, contentType: 'text/plain' });
    clock = NOW + 5_000;
    expect(await responseCache.get('fp')).toBeUndefined();
  });

  test('entries live under the configured prefix', async () => {
    const store = new MemoryStore();
    const responseCache = new ResponseCache({ store, prefix: 'api', logger: silent });

    await responseCache.put('fp', { body: 'x', statusCode: 200, contentType: 'text/plain' });
    expect(await store.get('api:fp')).toMatchObject({ body: 'x', bodyEncoding: 'utf8' });
  });

  test('invalidate removes entries and reports failures', async () => {
    const responseCache = new ResponseCache({ store: new MemoryStore(), logger: silent });
    await responseCache.put('a', { body: 'x', statusCode: 200, contentType: 'text/plain' });
    await responseCache.put('b', { body: 'y', statusCode: 200, contentType: 'text/plain' });

    expect(await responseCache.invalidate('a', 'b')).toBe(true);
    expect(await responseCache.get('a')).toBeUndefined();
    expect(await responseCache.get('b')).toBeUndefined();

    const failing = new ResponseCache({
      store: { get: async () => undefined, set: async () => undefined, delete: async () => Promise.reject(new Error('down')) },
      logger: silent,
    });
    expect(await failing.invalidate('a')).toBe(false);
  });
});
