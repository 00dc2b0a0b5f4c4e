import express from 'express';
import request from 'supertest';
import { cache, ResponseCache } from '../src/lib/cache';
import { fingerprint } from '../src/lib/fingerprint';
import { invalidateCache, invalidateMatchingGet } from '../src/lib/invalidate';
import { createLogger } from '../src/lib/logger';
import { MemoryStore } from '../src/stores/memoryStore';
import type { CacheStore } from '../src/types';

const silent = createLogger({ level: 'silent' });

function itemsApp(responseCache: ResponseCache, writeMiddleware: express.RequestHandler) {
  const app = express();
  let version = 0;
  app.use(express.json());
  app.get('/items', cache({ cache: responseCache }), (_req, res) => res.json({ version }));
  app.post('/items', writeMiddleware, (_req, res) => {
    version += 1;
    res.status(201).json({ version });
  });
  return app;
}

describe('cache invalidation', () => {
  test('invalidateMatchingGet drops the GET entry for the written path', async () => {
    const responseCache = new ResponseCache({ store: new MemoryStore(), logger: silent });
    const app = itemsApp(responseCache, invalidateMatchingGet({ cache: responseCache }));

    await request(app).get('/items');
    expect((await request(app).get('/items')).headers['x-cache']).toBe('HIT');

    await request(app).post('/items').send({ name: 'lamp' });
    const res = await request(app).get('/items');

    expect(res.headers['x-cache']).toBe('MISS');
    expect(res.body).toEqual({ version: 1 });
  });

  test('invalidateCache drops explicit fingerprints and reports them', async () => {
    const responseCache = new ResponseCache({ store: new MemoryStore(), logger: silent });
    const listFingerprint = fingerprint({ method: 'GET', path: '/items', query: {} });
    const invalidated: string[][] = [];
    const app = itemsApp(
      responseCache,
      invalidateCache({
        cache: responseCache,
        fingerprints: [listFingerprint],
        hooks: { onInvalidated: ({ fingerprints }) => invalidated.push(fingerprints) },
      }),
    );

    await request(app).get('/items');
    await request(app).post('/items').send({});

    expect(invalidated).toEqual([[listFingerprint]]);
    expect((await request(app).get('/items')).body).toEqual({ version: 1 });
  });

  test('other entries are left alone', async () => {
    const responseCache = new ResponseCache({ store: new MemoryStore(), logger: silent });
    const app = itemsApp(responseCache, invalidateMatchingGet({ cache: responseCache }));

    await request(app).get('/items?page=2');
    await request(app).post('/items').send({});
    const res = await request(app).get('/items?page=2');

    expect(res.headers['x-cache']).toBe('HIT');
    expect(res.body).toEqual({ version: 0 });
  });

  test('a failed invalidation does not fail the write', async () => {
    const store: CacheStore = {
      get: async () => undefined,
      set: async () => undefined,
      delete: async () => {
        throw new Error('connection reset');
      },
    };
    const responseCache = new ResponseCache({ store, logger: silent });
    const invalidated: string[][] = [];
    const app = itemsApp(
      responseCache,
      invalidateCache({
        cache: responseCache,
        fingerprints: ['fp'],
        hooks: { onInvalidated: ({ fingerprints }) => invalidated.push(fingerprints) },
      }),
    );

    const res = await request(app).post('/items').send({});
    expect(res.status).toBe(201);
    expect(invalidated).toEqual([]);
  });

  test('a throwing resolver is reported and the request continues', async () => {
    const responseCache = new ResponseCache({ store: new MemoryStore(), logger: silent });
    const errors: unknown[] = [];
    const app = itemsApp(
      responseCache,
      invalidateCache({
        cache: responseCache,
        resolveFingerprints: () => {
          throw new Error('no id');
        },
        hooks: { onError: ({ error }) => errors.push(error) },
      }),
    );

    const res = await request(app).post('/items').send({});
    expect(res.status).toBe(201);
    expect(errors).toHaveLength(1);
  });
});
