import oracledb from 'oracledb';
import { Pool } from 'pg';
import type { AppConfig } from '../config';
import type { Logger } from '../lib/logger';
import { OracleGateway, fromOraclePool } from './oracle';
import { PostgresGateway, fromPgPool } from './postgres';
import type { DataGateway } from './types';

/**
 * Binds the one engine named by configuration for the life of the process.
 * There is no fallback to the other engine.
 */
export async function createGateway(config: AppConfig['database'], logger: Logger): Promise<DataGateway> {
  const options = { acquireRetryDelayMs: config.acquireRetryDelayMs, logger: logger.child({ component: 'db' }) };

  switch (config.type) {
    case 'postgres': {
      const pool = new Pool({
        connectionString: config.postgres.connectionString,
        max: config.poolMax,
        connectionTimeoutMillis: config.poolTimeoutMs,
        statement_timeout: config.statementTimeoutMs,
      });
      // Idle clients can fail between checkouts; pg emits that here and drops the client itself.
      pool.on('error', (error) => logger.warn({ err: error.message }, 'idle postgres client failed'));
      return new PostgresGateway(fromPgPool(pool), options);
    }
    case 'oracle': {
      const pool = await oracledb.createPool({
        user: config.oracle.user,
        password: config.oracle.password,
        connectString: config.oracle.connectString,
        poolMin: 0,
        poolMax: config.poolMax,
        queueTimeout: config.poolTimeoutMs,
      });
      return new OracleGateway(fromOraclePool(pool, { callTimeoutMs: config.statementTimeoutMs }), options);
    }
    default: {
      const unknownEngine: never = config.type;
      throw new Error(`unsupported database engine: ${String(unknownEngine)}`);
    }
  }
}

export { OracleGateway, fromOraclePool, normalizeOracleError, oracleDialect } from './oracle';
export type { OracleConnectionLike, OraclePoolLike } from './oracle';
export { PgVectorSearch, PostgresGateway, fromPgPool, normalizePgError, postgresDialect } from './postgres';
export type { PgClientLike, PgPoolLike } from './postgres';
export { SqlGateway, type GatewayOptions } from './gateway';
export { Repository, type Page, type RepositoryOptions } from './repository';
export { assertIdentifier, bindPlaceholders } from './sql';
export type {
  ConnectionHandle,
  DataGateway,
  Distance,
  Engine,
  NearestQuery,
  QueryResult,
  Row,
  SqlDialect,
  TransactionOptions,
  VectorSearch,
} from './types';
