export type Engine = 'postgres' | 'oracle';

export type Row = Record<string, unknown>;

export type QueryResult = {
  rows: Row[];
  rowCount: number;
  /** Oracle only: ROWID of the row an INSERT wrote. */
  lastRowid?: string;
};

/** Engine-specific SQL spelling. Statements are written once with `?` placeholders. */
export interface SqlDialect {
  readonly engine: Engine;
  quoteIdent(name: string): string;
  /** 1-based positional placeholder. */
  placeholder(index: number): string;
  paginate(sql: string, limit: number, offset: number): string;
}

/**
 * A session inside one transaction. Valid only until the transaction settles;
 * any use after that fails.
 */
export interface ConnectionHandle {
  readonly dialect: SqlDialect;
  query(sql: string, params?: readonly unknown[]): Promise<QueryResult>;
  /** First row, or `DataError{NotFound}`. */
  one(sql: string, params?: readonly unknown[]): Promise<Row>;
  maybeOne(sql: string, params?: readonly unknown[]): Promise<Row | undefined>;
  /** Inserts one row and returns it as stored, generated columns included. */
  insert(table: string, values: Readonly<Record<string, unknown>>): Promise<Row>;
}

export type TransactionOptions = {
  /** Aborting rejects pending work with `DataError{Cancelled}` and rolls back. */
  signal?: AbortSignal;
};

export type Distance = 'l2' | 'cosine' | 'inner_product';

export type NearestQuery = {
  table: string;
  column: string;
  embedding: readonly number[];
  limit: number;
  distance?: Distance;
  columns?: readonly string[];
};

export interface VectorSearch {
  /** Rows closest to `embedding`, nearest first, each with a `distance` column. */
  nearest(conn: ConnectionHandle, query: NearestQuery): Promise<Row[]>;
}

export interface DataGateway {
  readonly engine: Engine;
  readonly dialect: SqlDialect;
  /** Present only on engines with vector similarity support. */
  readonly vector?: VectorSearch;
  withTransaction<T>(fn: (conn: ConnectionHandle) => Promise<T>, options?: TransactionOptions): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
