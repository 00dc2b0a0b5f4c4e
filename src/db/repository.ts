import { z } from 'zod';
import { DataError } from '../lib/errors';
import { assertIdentifier } from './sql';
import type { ConnectionHandle, Row } from './types';

export type RepositoryOptions<T extends Row> = {
  table: string;
  /** Validates every row read back, whichever engine produced it. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  idColumn?: string;
  /** Columns set to the current time on every update. */
  touchColumns?: readonly string[];
  /** Default sort for `list`. */
  orderBy?: string;
};

export type Page = { limit?: number; offset?: number };

/**
 * CRUD over one table, written once against `ConnectionHandle` so it runs
 * unchanged on either engine.
 */
export class Repository<T extends Row> {
  readonly table: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly idColumn: string;
  private readonly touchColumns: readonly string[];
  private readonly orderBy: string;

  constructor(options: RepositoryOptions<T>) {
    this.table = assertIdentifier(options.table);
    this.schema = options.schema;
    this.idColumn = assertIdentifier(options.idColumn ?? 'id');
    this.touchColumns = (options.touchColumns ?? []).map(assertIdentifier);
    this.orderBy = assertIdentifier(options.orderBy ?? this.idColumn);
  }

  async get(conn: ConnectionHandle, id: unknown): Promise<T | undefined> {
    const row = await conn.maybeOne(`SELECT * FROM ${this.t(conn)} WHERE ${this.c(conn, this.idColumn)} = ?`, [id]);
    return row ? this.parse(row) : undefined;
  }

  async getOrFail(conn: ConnectionHandle, id: unknown): Promise<T> {
    const found = await this.get(conn, id);
    if (!found) throw new DataError('NotFound', `${this.table} ${String(id)} not found`);
    return found;
  }

  async list(conn: ConnectionHandle, page: Page = {}): Promise<T[]> {
    const { limit = 100, offset = 0 } = page;
    const sql = conn.dialect.paginate(`SELECT * FROM ${this.t(conn)} ORDER BY ${this.c(conn, this.orderBy)}`, limit, offset);
    const { rows } = await conn.query(sql);
    return rows.map((row) => this.parse(row));
  }

  async count(conn: ConnectionHandle): Promise<number> {
    const row = await conn.one(`SELECT COUNT(*) AS total FROM ${this.t(conn)}`);
    return z.coerce.number().int().parse(row.total);
  }

  async create(conn: ConnectionHandle, values: Readonly<Record<string, unknown>>): Promise<T> {
    return this.parse(await conn.insert(this.table, values));
  }

  /** Applies the defined fields of `changes`; resolves undefined when no row has `id`. */
  async update(conn: ConnectionHandle, id: unknown, changes: Readonly<Record<string, unknown>>): Promise<T | undefined> {
    const entries = Object.entries(changes).filter(([column, value]) => value !== undefined && column !== this.idColumn);
    const touched = this.touchColumns.filter((column) => !entries.some(([name]) => name === column));
    const assignments = [
      ...entries.map(([column]) => `${this.c(conn, assertIdentifier(column))} = ?`),
      ...touched.map((column) => `${this.c(conn, column)} = CURRENT_TIMESTAMP`),
    ];
    if (assignments.length === 0) return this.get(conn, id);

    const { rowCount } = await conn.query(
      `UPDATE ${this.t(conn)} SET ${assignments.join(', ')} WHERE ${this.c(conn, this.idColumn)} = ?`,
      [...entries.map(([, value]) => value), id],
    );
    return rowCount === 0 ? undefined : this.get(conn, id);
  }

  /** Deletes the row and returns it as it was; undefined when absent. */
  async delete(conn: ConnectionHandle, id: unknown): Promise<T | undefined> {
    const existing = await this.get(conn, id);
    if (!existing) return undefined;
    await conn.query(`DELETE FROM ${this.t(conn)} WHERE ${this.c(conn, this.idColumn)} = ?`, [id]);
    return existing;
  }

  private t(conn: ConnectionHandle): string {
    return conn.dialect.quoteIdent(this.table);
  }

  private c(conn: ConnectionHandle, column: string): string {
    return conn.dialect.quoteIdent(column);
  }

  private parse(row: Row): T {
    const result = this.schema.safeParse(row);
    if (!result.success) {
      throw new DataError('Other', `${this.table} row failed validation: ${result.error.issues[0]?.message ?? 'invalid'}`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}
