import type { Server } from 'node:http';
import Redis from 'ioredis';
import { createApp, type RegisterRoutes } from './app';
import { loadConfig, loadEnv, type AppConfig } from './config';
import { createGateway } from './db';
import type { DataGateway } from './db/types';
import { TokenVerifier } from './lib/auth';
import { ResponseCache } from './lib/cache';
import { errorMessage } from './lib/errors';
import { createLogger, type Logger } from './lib/logger';
import { createPipeline, type Pipeline } from './lib/pipeline';
import { RateLimiter } from './lib/rateLimit';
import { ObjectStorage, createS3Client } from './storage/objectStorage';
import { RedisStore } from './stores/redisStore';

export type Services = {
  config: AppConfig;
  logger: Logger;
  gateway: DataGateway;
  storage: ObjectStorage;
  verifier: TokenVerifier;
  limiter?: RateLimiter;
  responseCache?: ResponseCache;
  pipeline: Pipeline;
};

export type Running = {
  server: Server;
  services: Services;
  shutdown(): Promise<void>;
};

/**
 * Wires configuration, logger, shared store, gateway and storage into an app
 * and starts listening. SIGTERM and SIGINT close the server, the pool and the
 * store connection in that order.
 */
export async function bootstrap(routes: (services: Services) => RegisterRoutes): Promise<Running> {
  loadEnv();
  const config = loadConfig();
  const logger = createLogger({ level: config.service.logLevel, service: config.service.name });

  const redis = new Redis(config.redis.url, { maxRetriesPerRequest: 1, enableOfflineQueue: false });
  redis.on('error', (error: Error) => logger.warn({ err: error.message }, 'redis connection error'));
  const store = new RedisStore(redis);

  const gateway = await createGateway(config.database, logger);
  const storage = new ObjectStorage({ client: createS3Client(config.storage), logger: logger.child({ component: 'storage' }) });
  const verifier = new TokenVerifier({
    secret: config.jwt.secret,
    algorithms: [config.jwt.algorithm],
    clockToleranceSeconds: config.jwt.clockSkewSeconds,
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
  });
  const limiter = config.rateLimit.enabled
    ? new RateLimiter({
        store,
        timeoutMs: config.redis.timeoutMs,
        onStoreFailure: config.rateLimit.failureMode,
        logger: logger.child({ component: 'rate-limit' }),
      })
    : undefined;
  const responseCache = config.cache.enabled
    ? new ResponseCache({
        store,
        defaultTtlSeconds: config.cache.ttlSeconds,
        timeoutMs: config.redis.timeoutMs,
        logger: logger.child({ component: 'cache' }),
      })
    : undefined;
  const pipeline = createPipeline({
    verifier,
    limiter,
    responseCache,
    defaults: { requests: config.rateLimit.requests, window: config.rateLimit.windowSeconds, cacheTtl: config.cache.ttlSeconds },
  });

  const services: Services = { config, logger, gateway, storage, verifier, limiter, responseCache, pipeline };
  const app = createApp(
    {
      logger,
      pipeline,
      service: config.service.name,
      trustProxy: config.service.trustProxy,
      probes: { database: () => gateway.ping(), store: () => store.ping() },
    },
    routes(services),
  );

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.service.port, () => resolve(listening));
    listening.once('error', reject);
  });
  logger.info({ port: config.service.port, engine: gateway.engine }, 'listening');

  let closing: Promise<void> | undefined;
  const shutdown = () => {
    return (closing ??= (async () => {
      logger.info('shutting down');
      await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
      await gateway.close();
      await redis.quit();
    })());
  };
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'signal received');
    void shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: errorMessage(error) }, 'shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);

  return { server, services, shutdown };
}
