import express, { type Request } from 'express';
import { z } from 'zod';
import type { RegisterRoutes } from '../../src/app';
import { Repository } from '../../src/db/repository';
import { DataError, ForbiddenError } from '../../src/lib/errors';
import { fingerprint } from '../../src/lib/fingerprint';
import { invalidateCache, invalidateMatchingGet } from '../../src/lib/invalidate';
import { principalOf } from '../../src/lib/pipeline';
import type { Services } from '../../src/server';

export const itemSchema = z.object({
  id: z.coerce.number().int(),
  name: z.string(),
  description: z.string().nullable(),
  price: z.coerce.number(),
  owner: z.string(),
  image_path: z.string().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

export type Item = z.infer<typeof itemSchema>;

const createItem = z.object({
  name: z.string().min(1).max(255),
  description: z.string().optional(),
  price: z.number().positive(),
});

const updateItem = createItem.partial();

const pageQuery = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(100),
});

const nearestQuery = z.object({
  embedding: z.string().transform((value, ctx) => {
    const numbers = value.split(',').map(Number);
    if (numbers.some((n) => !Number.isFinite(n))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'embedding must be comma-separated numbers' });
      return z.NEVER;
    }
    return numbers;
  }),
  limit: z.coerce.number().int().min(1).max(50).default(5),
});

export const items = new Repository<Item>({ table: 'items', schema: itemSchema, touchColumns: ['updated_at'] });

function itemId(req: Request): number {
  const parsed = z.coerce.number().int().positive().safeParse(req.params.id);
  if (!parsed.success) throw new DataError('NotFound', `no item ${req.params.id}`);
  return parsed.data;
}

const listFingerprint = fingerprint({ method: 'GET', path: '/items', query: {} });

/**
 * Items CRUD with image upload and presigned download links. Writes drop the
 * cached GET for the same path and the unfiltered list; other cached pages
 * expire on their TTL.
 */
export function itemRoutes(services: Services): RegisterRoutes {
  const { gateway, storage, config, responseCache } = services;
  const bucket = config.storage.bucket;
  const invalidate = responseCache
    ? [invalidateMatchingGet({ cache: responseCache }), invalidateCache({ cache: responseCache, fingerprints: [listFingerprint] })]
    : [];

  return (router, pipeline) => {
    router.get('/items', ...pipeline.route({ auth: 'optional', cache: { scope: 'public' } }), async (req, res, next) => {
      try {
        const { skip, limit } = pageQuery.parse(req.query);
        const page = await gateway.withTransaction(
          async (conn) => ({ items: await items.list(conn, { limit, offset: skip }), total: await items.count(conn) }),
          { signal: req.signal },
        );
        res.json({ ...page, skip, limit });
      } catch (error) {
        next(error);
      }
    });

    router.get('/items/nearest', ...pipeline.route({ auth: 'optional' }), async (req, res, next) => {
      try {
        const vector = gateway.vector;
        if (!vector) {
          res.status(501).json({ error: 'not_supported', kind: 'VectorSearch' });
          return;
        }
        const { embedding, limit } = nearestQuery.parse(req.query);
        const rows = await gateway.withTransaction(
          (conn) => vector.nearest(conn, { table: 'items', column: 'embedding', embedding, limit, columns: ['id', 'name'] }),
          { signal: req.signal },
        );
        res.json({ items: rows });
      } catch (error) {
        next(error);
      }
    });

    router.get('/items/:id', ...pipeline.route({ auth: 'optional', cache: { scope: 'public' } }), async (req, res, next) => {
      try {
        const id = itemId(req);
        res.json(await gateway.withTransaction((conn) => items.getOrFail(conn, id), { signal: req.signal }));
      } catch (error) {
        next(error);
      }
    });

    router.post('/items', ...pipeline.route({ scopes: ['items:write'] }), ...invalidate, async (req, res, next) => {
      try {
        const input = createItem.parse(req.body);
        const owner = principalOf(req).subject;
        const item = await gateway.withTransaction((conn) => items.create(conn, { ...input, owner }), { signal: req.signal });
        res.status(201).json(item);
      } catch (error) {
        next(error);
      }
    });

    router.put('/items/:id', ...pipeline.route({ scopes: ['items:write'] }), ...invalidate, async (req, res, next) => {
      try {
        const id = itemId(req);
        const changes = updateItem.parse(req.body);
        const item = await gateway.withTransaction(async (conn) => {
          const existing = await items.getOrFail(conn, id);
          const principal = principalOf(req);
          // Owners edit their own items; `items:admin` edits any.
          if (existing.owner !== principal.subject && !principal.scopes.includes('items:admin')) {
            throw new ForbiddenError(['items:admin']);
          }
          return items.update(conn, id, changes);
        }, { signal: req.signal });
        res.json(item);
      } catch (error) {
        next(error);
      }
    });

    router.delete('/items/:id', ...pipeline.route({ scopes: ['items:write'] }), ...invalidate, async (req, res, next) => {
      try {
        const id = itemId(req);
        const removed = await gateway.withTransaction((conn) => items.delete(conn, id), { signal: req.signal });
        if (!removed) throw new DataError('NotFound', `no item ${id}`);
        if (removed.image_path) await storage.delete(bucket, removed.image_path);
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    });

    router.put(
      '/items/:id/image',
      ...pipeline.route({ scopes: ['items:write'] }),
      ...invalidate,
      express.raw({ type: 'image/*', limit: '10mb' }),
      async (req, res, next) => {
        try {
          const id = itemId(req);
          if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
            res.status(400).json({ error: 'bad_request', kind: 'EmptyBody' });
            return;
          }
          const key = `items/${id}/image`;
          const stored = await storage.put(bucket, key, req.body, { contentType: req.header('content-type') });
          const item = await gateway.withTransaction((conn) => items.update(conn, id, { image_path: key }), { signal: req.signal });
          if (!item) throw new DataError('NotFound', `no item ${id}`);
          res.json({ ...item, size: stored.size });
        } catch (error) {
          next(error);
        }
      },
    );

    router.get('/items/:id/image-url', ...pipeline.route({ auth: 'optional' }), async (req, res, next) => {
      try {
        const id = itemId(req);
        const item = await gateway.withTransaction((conn) => items.getOrFail(conn, id), { signal: req.signal });
        if (!item.image_path) throw new DataError('NotFound', `item ${id} has no image`);
        const signed = await storage.signedUrl(bucket, item.image_path, config.storage.signedUrlExpirySeconds, 'read');
        res.json({ url: signed.url, expiresAt: signed.expiresAt.toISOString() });
      } catch (error) {
        next(error);
      }
    });
  };
}
