import oracledb, { type Pool } from 'oracledb';
import { DataError, errorCode, errorMessage, type DataErrorKind } from '../lib/errors';
import { SqlGateway, lowerCaseKeys, type GatewayOptions } from './gateway';
import { assertPage } from './sql';
import type { ConnectionHandle, QueryResult, Row, SqlDialect } from './types';

export interface OracleConnectionLike {
  execute(sql: string, params: unknown[]): Promise<{ rows: Row[]; rowCount: number; lastRowid?: string }>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  /** Interrupts the statement currently running on this connection. */
  break(): Promise<void>;
  close(options?: { drop: boolean }): Promise<void>;
}

export interface OraclePoolLike {
  getConnection(): Promise<OracleConnectionLike>;
  close(drainSeconds?: number): Promise<void>;
}

/** Narrows a node-oracledb pool to what the gateway calls. Rows come back as objects. */
export function fromOraclePool(pool: Pool, options: { callTimeoutMs?: number } = {}): OraclePoolLike {
  return {
    getConnection: async () => {
      const connection = await pool.getConnection();
      if (options.callTimeoutMs !== undefined) connection.callTimeout = options.callTimeoutMs;
      return {
        execute: async (sql, params) => {
          const result = await connection.execute<Row>(sql, params, {
            outFormat: oracledb.OUT_FORMAT_OBJECT,
            autoCommit: false,
          });
          const rows = result.rows ?? [];
          return { rows, rowCount: result.rowsAffected ?? rows.length, lastRowid: result.lastRowid };
        },
        commit: () => connection.commit(),
        rollback: () => connection.rollback(),
        break: () => connection.break(),
        close: (closeOptions) => (closeOptions ? connection.close(closeOptions) : connection.close()),
      };
    },
    close: (drainSeconds) => (drainSeconds === undefined ? pool.close() : pool.close(drainSeconds)),
  };
}

// Unquoted identifiers fold to upper case in Oracle; quoting the folded name keeps both spellings equivalent.
export const oracleDialect: SqlDialect = {
  engine: 'oracle',
  quoteIdent: (name) => `"${name.toUpperCase().replace(/"/g, '""')}"`,
  placeholder: (index) => `:${index}`,
  paginate: (sql, limit, offset) => {
    assertPage(limit, offset);
    return `${sql} OFFSET ${offset} ROWS FETCH NEXT ${limit} ROWS ONLY`;
  },
};

const CODES: Record<string, DataErrorKind> = {
  'ORA-00001': 'Conflict', // unique constraint violated
  'ORA-02291': 'Conflict', // parent key not found
  'ORA-02292': 'Conflict', // child record found
  'ORA-08177': 'Conflict', // cannot serialize access
  'ORA-00060': 'Conflict', // deadlock detected
  'ORA-01403': 'NotFound', // no data found
  'ORA-01013': 'Cancelled', // user requested cancel of current operation
  'ORA-03156': 'Timeout', // call timed out
  'ORA-12170': 'Timeout', // connect timeout
  'ORA-00054': 'Timeout', // resource busy, NOWAIT specified or timeout expired
  'NJS-040': 'Timeout', // pool queue timeout
  'NJS-123': 'Timeout', // call timeout exceeded
  'DPI-1067': 'Timeout', // call timeout exceeded
  'ORA-03113': 'ConnectionLost', // end-of-file on communication channel
  'ORA-03114': 'ConnectionLost', // not connected
  'ORA-03135': 'ConnectionLost', // connection lost contact
  'ORA-12514': 'ConnectionLost', // listener does not know of service
  'ORA-12541': 'ConnectionLost', // no listener
  'NJS-003': 'ConnectionLost', // invalid or closed connection
  'NJS-500': 'ConnectionLost', // connection to the database was broken
  'NJS-501': 'ConnectionLost',
  'NJS-503': 'ConnectionLost', // connection could not be established
  'DPI-1080': 'ConnectionLost', // connection closed by ORA-3113
  ECONNREFUSED: 'ConnectionLost',
  ECONNRESET: 'ConnectionLost',
  EPIPE: 'ConnectionLost',
  ETIMEDOUT: 'Timeout',
};

export function normalizeOracleError(error: unknown): DataError {
  if (error instanceof DataError) return error;
  const code = errorCode(error);
  const message = errorMessage(error);
  const prefixed = /^((?:ORA|NJS|DPI)-\d+)/.exec(message)?.[1];
  const kind = (code !== undefined ? CODES[code] : undefined) ?? (prefixed !== undefined ? CODES[prefixed] : undefined) ?? 'Other';
  return new DataError(kind, `oracle: ${message}`, { cause: error });
}

export class OracleGateway extends SqlGateway<OracleConnectionLike> {
  readonly engine = 'oracle';
  readonly dialect = oracleDialect;

  constructor(private readonly pool: OraclePoolLike, options?: GatewayOptions) {
    super(options);
  }

  protected acquire(): Promise<OracleConnectionLike> {
    return this.pool.getConnection();
  }

  protected release(connection: OracleConnectionLike, broken: boolean): Promise<void> {
    return connection.close(broken ? { drop: true } : undefined);
  }

  // Transactions begin implicitly with the first statement.
  protected async begin(): Promise<void> {}

  protected commit(connection: OracleConnectionLike): Promise<void> {
    return connection.commit();
  }

  protected rollback(connection: OracleConnectionLike): Promise<void> {
    return connection.rollback();
  }

  protected async execute(connection: OracleConnectionLike, sql: string, params: readonly unknown[]): Promise<QueryResult> {
    const { rows, rowCount, lastRowid } = await connection.execute(sql, [...params]);
    return { rows: rows.map(lowerCaseKeys), rowCount, lastRowid };
  }

  protected async interrupt(connection: OracleConnectionLike): Promise<boolean> {
    await connection.break();
    return true;
  }

  protected async insertRow(conn: ConnectionHandle, table: string, columns: string[], params: unknown[]): Promise<Row> {
    const q = this.dialect.quoteIdent;
    const sql =
      columns.length === 0
        ? `INSERT INTO ${q(table)} VALUES (DEFAULT)`
        : `INSERT INTO ${q(table)} (${columns.map(q).join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`;
    const { lastRowid } = await conn.query(sql, params);
    if (!lastRowid) throw new DataError('Other', `insert into ${table} reported no ROWID`);
    return conn.one(`SELECT * FROM ${q(table)} WHERE ROWID = ?`, [lastRowid]);
  }

  normalize(error: unknown): DataError {
    return normalizeOracleError(error);
  }

  async ping(): Promise<void> {
    let connection: OracleConnectionLike;
    try {
      connection = await this.pool.getConnection();
    } catch (error) {
      throw normalizeOracleError(error);
    }
    try {
      await connection.execute('SELECT 1 FROM DUAL', []);
      await connection.close();
    } catch (error) {
      await connection.close({ drop: true }).catch((closeError: unknown) => {
        this.logger.warn({ err: errorMessage(closeError) }, 'failed to drop connection after ping');
      });
      throw normalizeOracleError(error);
    }
  }

  close(): Promise<void> {
    return this.pool.close(10);
  }
}
