export * from './lib/auth';
export * from './lib/rateLimit';
export * from './lib/cache';
export * from './lib/invalidate';
export * from './lib/keys';
export * from './lib/fingerprint';
export * from './lib/pipeline';
export * from './lib/errors';
export * from './lib/errorHandler';
export * from './lib/health';
export * from './lib/logger';
export * from './lib/requestLogger';
export { AbortedError, TimeoutError, withTimeout } from './lib/timeout';
export * from './stores/memoryStore';
export * from './stores/redisStore';
export * from './db';
export * from './storage/objectStorage';
export * from './storage/signedUrl';
export { createApp, type CreateAppOptions, type RegisterRoutes } from './app';
export { loadConfig, loadEnv, type AppConfig } from './config';
export { bootstrap, type Running, type Services } from './server';
export type { CacheEntry, CacheStore, Clock, Pingable, Principal, RateLimitStore } from './types';
