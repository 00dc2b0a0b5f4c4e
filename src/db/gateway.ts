import { DataError, errorMessage } from '../lib/errors';
import { logger as defaultLogger, type Logger } from '../lib/logger';
import { AbortedError, sleep, withTimeout } from '../lib/timeout';
import { assertIdentifier, bindPlaceholders } from './sql';
import type {
  ConnectionHandle,
  DataGateway,
  Engine,
  QueryResult,
  Row,
  SqlDialect,
  TransactionOptions,
  VectorSearch,
} from './types';

export type GatewayOptions = {
  /** Pause before the single retry of a failed acquisition. */
  acquireRetryDelayMs?: number;
  logger?: Logger;
};

type Session = {
  open: boolean;
  /** False once an interrupted statement may still be running on the connection. */
  usable: boolean;
};

const cancelled = (cause?: unknown) => new DataError('Cancelled', 'request was cancelled', { cause });

/**
 * One transaction shape for every engine: acquire (retried once on a
 * transient failure), begin, run `fn`, then commit, or roll back if anything
 * threw. Engines fill in the driver calls and the error table.
 */
export abstract class SqlGateway<C> implements DataGateway {
  abstract readonly engine: Engine;
  abstract readonly dialect: SqlDialect;
  readonly vector?: VectorSearch;

  protected readonly logger: Logger;
  private readonly acquireRetryDelayMs: number;

  constructor(options: GatewayOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.acquireRetryDelayMs = options.acquireRetryDelayMs ?? 100;
  }

  protected abstract acquire(): Promise<C>;
  /** `broken` connections are destroyed rather than returned to the pool. */
  protected abstract release(conn: C, broken: boolean): Promise<void>;
  protected abstract begin(conn: C): Promise<void>;
  protected abstract commit(conn: C): Promise<void>;
  protected abstract rollback(conn: C): Promise<void>;
  protected abstract execute(conn: C, sql: string, params: readonly unknown[]): Promise<QueryResult>;
  /** Stops the statement running on `conn`; resolves whether the connection can still be used. */
  protected abstract interrupt(conn: C): Promise<boolean>;
  protected abstract insertRow(conn: ConnectionHandle, table: string, columns: string[], params: unknown[]): Promise<Row>;
  /** Maps a driver error onto the shared taxonomy. */
  abstract normalize(error: unknown): DataError;
  abstract ping(): Promise<void>;
  abstract close(): Promise<void>;

  async withTransaction<T>(fn: (conn: ConnectionHandle) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) throw cancelled();

    const conn = await this.acquireWithRetry();
    const session: Session = { open: true, usable: true };
    let broken = false;
    try {
      if (signal?.aborted) throw cancelled();
      await this.guard(conn, session, () => this.begin(conn), signal);
      const result = await fn(this.handle(conn, session, signal));
      await this.guard(conn, session, () => this.commit(conn), signal);
      return result;
    } catch (error) {
      broken = !(await this.rollbackQuietly(conn, session));
      throw error;
    } finally {
      session.open = false;
      await this.release(conn, broken || !session.usable).catch((error: unknown) => {
        this.logger.error({ engine: this.engine, err: errorMessage(error) }, 'failed to release connection');
      });
    }
  }

  private async acquireWithRetry(): Promise<C> {
    try {
      return await this.acquireOnce();
    } catch (error) {
      if (!(error instanceof DataError) || !error.transient) throw error;
      this.logger.warn({ engine: this.engine, kind: error.kind, err: error.message }, 'connection acquisition failed; retrying once');
      await sleep(this.acquireRetryDelayMs);
      return this.acquireOnce();
    }
  }

  private async acquireOnce(): Promise<C> {
    try {
      return await this.acquire();
    } catch (error) {
      throw this.normalize(error);
    }
  }

  private async rollbackQuietly(conn: C, session: Session): Promise<boolean> {
    if (!session.usable) return false;
    try {
      await this.rollback(conn);
      return true;
    } catch (error) {
      this.logger.error({ engine: this.engine, err: errorMessage(error) }, 'rollback failed; discarding connection');
      return false;
    }
  }

  private async guard<T>(conn: C, session: Session, work: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!session.open) throw new DataError('Other', 'connection used after its transaction ended');
    if (signal?.aborted) throw cancelled();
    try {
      return await withTimeout(work(), undefined, signal);
    } catch (error) {
      if (error instanceof AbortedError) {
        session.usable = await this.interrupt(conn).catch((interruptError: unknown) => {
          this.logger.warn({ engine: this.engine, err: errorMessage(interruptError) }, 'could not interrupt statement');
          return false;
        });
        throw cancelled(error);
      }
      if (error instanceof DataError) throw error;
      throw this.normalize(error);
    }
  }

  private handle(conn: C, session: Session, signal?: AbortSignal): ConnectionHandle {
    const query = (sql: string, params: readonly unknown[] = []) => {
      const bound = bindPlaceholders(sql, params.length, (index) => this.dialect.placeholder(index));
      return this.guard(conn, session, () => this.execute(conn, bound, params), signal);
    };
    const maybeOne = async (sql: string, params?: readonly unknown[]) => {
      const { rows } = await query(sql, params);
      return rows[0];
    };

    const handle: ConnectionHandle = {
      dialect: this.dialect,
      query,
      maybeOne,
      one: async (sql, params) => {
        const row = await maybeOne(sql, params);
        if (!row) throw new DataError('NotFound', 'no row matched');
        return row;
      },
      insert: (table, values) => {
        const entries = Object.entries(values).filter(([, value]) => value !== undefined);
        return this.insertRow(
          handle,
          assertIdentifier(table),
          entries.map(([column]) => assertIdentifier(column)),
          entries.map(([, value]) => value),
        );
      },
    };
    return handle;
  }
}

/** Lower-cases column names so rows read the same whatever the engine folds identifiers to. */
export function lowerCaseKeys(row: Row): Row {
  return Object.fromEntries(Object.entries(row).map(([key, value]) => [key.toLowerCase(), value]));
}
