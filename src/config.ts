import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import type { Algorithm } from 'jsonwebtoken';
import type { LevelWithSilent } from 'pino';
import { z } from 'zod';
import type { Engine } from './db/types';
import { ConfigError } from './lib/errors';
import { isLogLevel } from './lib/logger';
import type { FailurePolicy } from './lib/rateLimit';

const TRUE = new Set(['true', '1', 'yes', 'on']);
const FALSE = new Set(['false', '0', 'no', 'off']);

const blank = (value: unknown) => (value === '' ? undefined : value);

const text = (fallback: string) => z.preprocess(blank, z.string().default(fallback));
const optionalText = () => z.preprocess(blank, z.string().optional());
const int = (fallback: number, min = 0) => z.preprocess(blank, z.coerce.number().int().min(min).default(fallback));
const flag = (fallback: boolean) =>
  z.preprocess(
    blank,
    z
      .string()
      .optional()
      .transform((value, ctx) => {
        if (value === undefined) return fallback;
        const normalized = value.trim().toLowerCase();
        if (TRUE.has(normalized)) return true;
        if (FALSE.has(normalized)) return false;
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
        return z.NEVER;
      }),
  );

const envSchema = z.object({
  NODE_ENV: text('development'),
  SERVICE_NAME: text('api-stack'),
  PORT: int(8000, 1),
  LOG_LEVEL: z.preprocess(
    blank,
    z
      .string()
      .default('info')
      .transform((value) => value.trim().toLowerCase())
      .refine((value): value is LevelWithSilent => isLogLevel(value), { message: 'unknown log level' }),
  ),
  TRUST_PROXY: flag(true),

  DATABASE_TYPE: z.preprocess(blank, z.enum(['postgres', 'oracle']).default('postgres')),
  POSTGRES_URL: optionalText(),
  POSTGRES_SERVER: text('localhost'),
  POSTGRES_PORT: int(5432, 1),
  POSTGRES_USER: text('postgres'),
  POSTGRES_PASSWORD: text('postgres'),
  POSTGRES_DB: text('app'),
  ORACLE_SERVER: text('localhost'),
  ORACLE_PORT: int(1521, 1),
  ORACLE_USER: text('oracle'),
  ORACLE_PASSWORD: text('oracle'),
  ORACLE_DB: text('app'),
  DB_POOL_MAX: int(10, 1),
  DB_POOL_TIMEOUT_MS: int(5000, 1),
  DB_STATEMENT_TIMEOUT_MS: int(30000, 1),
  DB_ACQUIRE_RETRY_DELAY_MS: int(100),

  REDIS_URL: optionalText(),
  REDIS_SERVER: text('localhost'),
  REDIS_PORT: int(6379, 1),
  REDIS_PASSWORD: optionalText(),
  REDIS_DB: int(0),
  STORE_TIMEOUT_MS: int(250, 1),

  RATE_LIMIT_ENABLED: flag(true),
  RATE_LIMIT_REQUESTS: int(100, 1),
  RATE_LIMIT_WINDOW_SECONDS: int(60, 1),
  RATE_LIMIT_FAILURE_MODE: z.preprocess(blank, z.enum(['open', 'closed']).default('open')),

  CACHE_ENABLED: flag(true),
  CACHE_EXPIRE_SECONDS: int(300, 1),

  JWT_SECRET: z.string({ required_error: 'JWT_SECRET is required' }).min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_ALGORITHM: z.preprocess(blank, z.enum(['HS256', 'HS384', 'HS512']).default('HS256')),
  JWT_CLOCK_SKEW_SECONDS: int(30),
  JWT_ISSUER: optionalText(),
  JWT_AUDIENCE: optionalText(),

  MINIO_ENDPOINT: z.preprocess(blank, z.string().url().default('http://localhost:9000')),
  MINIO_REGION: text('us-east-1'),
  MINIO_ACCESS_KEY: text('minioadmin'),
  MINIO_SECRET_KEY: text('minioadmin'),
  MINIO_BUCKET_NAME: text('app-bucket'),
  SIGNED_URL_EXPIRY_SECONDS: z.preprocess(blank, z.coerce.number().int().min(0).max(604800).default(3600)),
});

export type AppConfig = Readonly<{
  service: Readonly<{ env: string; name: string; port: number; logLevel: LevelWithSilent; trustProxy: boolean }>;
  database: Readonly<{
    type: Engine;
    postgres: Readonly<{ connectionString: string }>;
    oracle: Readonly<{ connectString: string; user: string; password: string }>;
    poolMax: number;
    poolTimeoutMs: number;
    statementTimeoutMs: number;
    acquireRetryDelayMs: number;
  }>;
  redis: Readonly<{ url: string; timeoutMs: number }>;
  rateLimit: Readonly<{ enabled: boolean; requests: number; windowSeconds: number; failureMode: FailurePolicy }>;
  cache: Readonly<{ enabled: boolean; ttlSeconds: number }>;
  jwt: Readonly<{ secret: string; algorithm: Algorithm; clockSkewSeconds: number; issuer?: string; audience?: string }>;
  storage: Readonly<{
    endpoint: string;
    region: string;
    accessKey: string;
    secretKey: string;
    bucket: string;
    signedUrlExpirySeconds: number;
  }>;
}>;

const credentials = (user: string, password?: string) =>
  password ? `${encodeURIComponent(user)}:${encodeURIComponent(password)}@` : user ? `${encodeURIComponent(user)}@` : '';

/**
 * Validates the environment once at startup. Every invalid variable is
 * reported together in one ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;

  return Object.freeze({
    service: Object.freeze({
      env: e.NODE_ENV,
      name: e.SERVICE_NAME,
      port: e.PORT,
      logLevel: e.LOG_LEVEL,
      trustProxy: e.TRUST_PROXY,
    }),
    database: Object.freeze({
      type: e.DATABASE_TYPE,
      postgres: Object.freeze({
        connectionString:
          e.POSTGRES_URL ??
          `postgres://${credentials(e.POSTGRES_USER, e.POSTGRES_PASSWORD)}${e.POSTGRES_SERVER}:${e.POSTGRES_PORT}/${e.POSTGRES_DB}`,
      }),
      oracle: Object.freeze({
        connectString: `${e.ORACLE_SERVER}:${e.ORACLE_PORT}/${e.ORACLE_DB}`,
        user: e.ORACLE_USER,
        password: e.ORACLE_PASSWORD,
      }),
      poolMax: e.DB_POOL_MAX,
      poolTimeoutMs: e.DB_POOL_TIMEOUT_MS,
      statementTimeoutMs: e.DB_STATEMENT_TIMEOUT_MS,
      acquireRetryDelayMs: e.DB_ACQUIRE_RETRY_DELAY_MS,
    }),
    redis: Object.freeze({
      url: e.REDIS_URL ?? `redis://${credentials('', e.REDIS_PASSWORD)}${e.REDIS_SERVER}:${e.REDIS_PORT}/${e.REDIS_DB}`,
      timeoutMs: e.STORE_TIMEOUT_MS,
    }),
    rateLimit: Object.freeze({
      enabled: e.RATE_LIMIT_ENABLED,
      requests: e.RATE_LIMIT_REQUESTS,
      windowSeconds: e.RATE_LIMIT_WINDOW_SECONDS,
      failureMode: e.RATE_LIMIT_FAILURE_MODE,
    }),
    cache: Object.freeze({ enabled: e.CACHE_ENABLED, ttlSeconds: e.CACHE_EXPIRE_SECONDS }),
    jwt: Object.freeze({
      secret: e.JWT_SECRET,
      algorithm: e.JWT_ALGORITHM,
      clockSkewSeconds: e.JWT_CLOCK_SKEW_SECONDS,
      issuer: e.JWT_ISSUER,
      audience: e.JWT_AUDIENCE,
    }),
    storage: Object.freeze({
      endpoint: e.MINIO_ENDPOINT,
      region: e.MINIO_REGION,
      accessKey: e.MINIO_ACCESS_KEY,
      secretKey: e.MINIO_SECRET_KEY,
      bucket: e.MINIO_BUCKET_NAME,
      signedUrlExpirySeconds: e.SIGNED_URL_EXPIRY_SECONDS,
    }),
  });
}

/** Loads `.env.<APP_ENV>` and then `.env` from `cwd`. Variables already set win. */
export function loadEnv(cwd: string = process.cwd(), appEnv: string | undefined = process.env.APP_ENV): string[] {
  const files = [appEnv ? `.env.${appEnv}` : undefined, '.env']
    .filter((name): name is string => name !== undefined)
    .map((name) => path.join(cwd, name))
    .filter((file) => fs.existsSync(file));
  for (const file of files) {
    const result = dotenv.config({ path: file });
    if (result.error) throw new ConfigError([`${file}: ${result.error.message}`]);
  }
  return files;
}
