import jwt from 'jsonwebtoken';
import { createApp } from '../../src/app';
import { TokenVerifier } from '../../src/lib/auth';
import { ResponseCache } from '../../src/lib/cache';
import { createLogger } from '../../src/lib/logger';
import { createPipeline, principalOf } from '../../src/lib/pipeline';
import { RateLimiter } from '../../src/lib/rateLimit';
import { MemoryStore } from '../../src/stores/memoryStore';

// Single-process wiring with no external services: counters and cached
// responses live in a MemoryStore.
const secret = process.env.JWT_SECRET ?? 'local-development-secret';
const logger = createLogger({ level: 'info', service: 'in-memory-example' });
const store = new MemoryStore();
setInterval(() => store.sweep(), 60_000).unref();

const pipeline = createPipeline({
  verifier: new TokenVerifier({ secret }),
  limiter: new RateLimiter({ store, logger }),
  responseCache: new ResponseCache({ store, defaultTtlSeconds: 30, logger }),
  defaults: { requests: 10, window: 60 },
});

let counter = 0;

const app = createApp({ logger, pipeline, service: 'in-memory-example' }, (router) => {
  router.get('/time', ...pipeline.route({ auth: 'none', cache: { ttl: 5 } }), (_req, res) => {
    res.json({ now: new Date().toISOString(), computed: ++counter });
  });

  router.get('/me', ...pipeline.route({ cache: true }), (req, res) => {
    const principal = principalOf(req);
    res.json({ subject: principal.subject, scopes: principal.scopes, computed: ++counter });
  });

  router.post('/reports', ...pipeline.route({ scopes: ['reports:write'], rateLimit: { requests: 2, window: 60 } }), (_req, res) => {
    res.status(202).json({ accepted: true });
  });
});

const port = Number(process.env.PORT ?? 3000);
app.listen(port, () => {
  const token = jwt.sign({ sub: 'demo-user', scope: 'reports:write' }, secret, { expiresIn: '1h' });
  logger.info({ port, token }, 'in-memory example listening; send the token as a Bearer credential');
});
