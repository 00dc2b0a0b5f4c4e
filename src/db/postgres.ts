import type { Pool } from 'pg';
import { DataError, errorCode, errorMessage, type DataErrorKind } from '../lib/errors';
import { SqlGateway, type GatewayOptions } from './gateway';
import { assertIdentifier, assertPage } from './sql';
import type { ConnectionHandle, Distance, NearestQuery, QueryResult, Row, SqlDialect, VectorSearch } from './types';

export interface PgClientLike {
  query(sql: string, params?: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }>;
  /** `true` destroys the connection instead of returning it to the pool. */
  release(destroy?: boolean): void;
}

export interface PgPoolLike {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

/** Narrows a node-postgres pool to what the gateway calls. */
export function fromPgPool(pool: Pool): PgPoolLike {
  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: async (sql, params) => {
          const result = await client.query(sql, params);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release: (destroy) => client.release(destroy),
      };
    },
    end: () => pool.end(),
  };
}

export const postgresDialect: SqlDialect = {
  engine: 'postgres',
  quoteIdent: (name) => `"${name.replace(/"/g, '""')}"`,
  placeholder: (index) => `$${index}`,
  paginate: (sql, limit, offset) => {
    assertPage(limit, offset);
    return `${sql} LIMIT ${limit} OFFSET ${offset}`;
  },
};

const SQLSTATE: Record<string, DataErrorKind> = {
  '23505': 'Conflict', // unique_violation
  '23503': 'Conflict', // foreign_key_violation
  '23P01': 'Conflict', // exclusion_violation
  '40001': 'Conflict', // serialization_failure
  '40P01': 'Conflict', // deadlock_detected
  '57014': 'Timeout', // query_canceled, raised by statement_timeout
  '55P03': 'Timeout', // lock_not_available
  '08000': 'ConnectionLost',
  '08001': 'ConnectionLost',
  '08003': 'ConnectionLost',
  '08004': 'ConnectionLost',
  '08006': 'ConnectionLost',
  '57P01': 'ConnectionLost', // admin_shutdown
  '57P02': 'ConnectionLost',
  '57P03': 'ConnectionLost', // cannot_connect_now
  '53300': 'ConnectionLost', // too_many_connections
};

const SOCKET: Record<string, DataErrorKind> = {
  ECONNREFUSED: 'ConnectionLost',
  ECONNRESET: 'ConnectionLost',
  EPIPE: 'ConnectionLost',
  ENOTFOUND: 'ConnectionLost',
  EHOSTUNREACH: 'ConnectionLost',
  ETIMEDOUT: 'Timeout',
};

export function normalizePgError(error: unknown): DataError {
  if (error instanceof DataError) return error;
  const code = errorCode(error);
  const message = errorMessage(error);
  const kind =
    (code !== undefined ? (SQLSTATE[code] ?? SOCKET[code]) : undefined) ??
    (/timeout exceeded when trying to connect|query read timeout/i.test(message)
      ? 'Timeout'
      : /connection terminated|not queryable|client has encountered a connection error/i.test(message)
        ? 'ConnectionLost'
        : 'Other');
  return new DataError(kind, `postgres: ${message}`, { cause: error });
}

const OPERATORS: Record<Distance, string> = {
  l2: '<->',
  cosine: '<=>',
  inner_product: '<#>',
};

/** pgvector nearest-neighbour search. The column must be of type `vector`. */
export class PgVectorSearch implements VectorSearch {
  async nearest(conn: ConnectionHandle, query: NearestQuery): Promise<Row[]> {
    const { table, column, embedding, limit, distance = 'l2', columns } = query;
    if (embedding.length === 0 || !embedding.every(Number.isFinite)) {
      throw new RangeError('embedding must be a non-empty list of finite numbers');
    }
    const q = postgresDialect.quoteIdent;
    const selected = columns ? columns.map((c) => q(assertIdentifier(c))).join(', ') : '*';
    const sql = postgresDialect.paginate(
      `SELECT ${selected}, ${q(assertIdentifier(column))} ${OPERATORS[distance]} ?::vector AS distance ` +
        `FROM ${q(assertIdentifier(table))} ORDER BY distance`,
      limit,
      0,
    );
    const { rows } = await conn.query(sql, [`[${embedding.join(',')}]`]);
    return rows;
  }
}

export class PostgresGateway extends SqlGateway<PgClientLike> {
  readonly engine = 'postgres';
  readonly dialect = postgresDialect;
  readonly vector = new PgVectorSearch();

  constructor(private readonly pool: PgPoolLike, options?: GatewayOptions) {
    super(options);
  }

  protected acquire(): Promise<PgClientLike> {
    return this.pool.connect();
  }

  protected async release(client: PgClientLike, broken: boolean): Promise<void> {
    client.release(broken);
  }

  protected async begin(client: PgClientLike): Promise<void> {
    await client.query('BEGIN');
  }

  protected async commit(client: PgClientLike): Promise<void> {
    await client.query('COMMIT');
  }

  protected async rollback(client: PgClientLike): Promise<void> {
    await client.query('ROLLBACK');
  }

  protected async execute(client: PgClientLike, sql: string, params: readonly unknown[]): Promise<QueryResult> {
    const { rows, rowCount } = await client.query(sql, [...params]);
    return { rows, rowCount: rowCount ?? rows.length };
  }

  // A running statement cannot be stopped from this connection; it is destroyed on release instead.
  protected async interrupt(): Promise<boolean> {
    return false;
  }

  protected insertRow(conn: ConnectionHandle, table: string, columns: string[], params: unknown[]): Promise<Row> {
    const q = this.dialect.quoteIdent;
    const sql =
      columns.length === 0
        ? `INSERT INTO ${q(table)} DEFAULT VALUES RETURNING *`
        : `INSERT INTO ${q(table)} (${columns.map(q).join(', ')}) VALUES (${columns.map(() => '?').join(', ')}) RETURNING *`;
    return conn.one(sql, params);
  }

  normalize(error: unknown): DataError {
    return normalizePgError(error);
  }

  async ping(): Promise<void> {
    let client: PgClientLike;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw normalizePgError(error);
    }
    try {
      await client.query('SELECT 1');
      client.release();
    } catch (error) {
      client.release(true);
      throw normalizePgError(error);
    }
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}
