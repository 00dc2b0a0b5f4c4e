import { DataError } from '../src/lib/errors';
import { createLogger } from '../src/lib/logger';
import { OracleGateway } from '../src/db/oracle';
import { PostgresGateway } from '../src/db/postgres';
import type { ConnectionHandle, DataGateway } from '../src/db/types';
import { FakeDatabase, FakeOraclePool, FakePgPool, driverError } from './support/fakeDrivers';

const silent = createLogger({ level: 'silent' });

async function transfer(conn: ConnectionHandle, from: number, to: number, amount: number): Promise<void> {
  const source = await conn.one('SELECT balance FROM accounts WHERE id = ?', [from]);
  const target = await conn.one('SELECT balance FROM accounts WHERE id = ?', [to]);
  await conn.query('UPDATE accounts SET balance = ? WHERE id = ?', [Number(source.balance) - amount, from]);
  await conn.query('UPDATE accounts SET balance = ? WHERE id = ?', [Number(target.balance) + amount, to]);
}

type Setup = {
  db: FakeDatabase;
  gateway: DataGateway;
  /** Destroy flags the gateway passed when giving connections back, one per transaction. */
  releases: () => boolean[];
  attempts: () => number;
  failConnects: (...errors: unknown[]) => void;
};

const engines: Array<[string, () => Setup]> = [
  [
    'postgres',
    () => {
      const db = new FakeDatabase({ 1: 100, 2: 0 });
      const pool = new FakePgPool(db);
      return {
        db,
        gateway: new PostgresGateway(pool, { acquireRetryDelayMs: 1, logger: silent }),
        releases: () => pool.clients.flatMap((client) => client.released),
        attempts: () => pool.connectAttempts,
        failConnects: (...errors) => pool.connectFailures.push(...errors),
      };
    },
  ],
  [
    'oracle',
    () => {
      const db = new FakeDatabase({ 1: 100, 2: 0 });
      const pool = new FakeOraclePool(db);
      return {
        db,
        gateway: new OracleGateway(pool, { acquireRetryDelayMs: 1, logger: silent }),
        releases: () => pool.connections.flatMap((connection) => connection.closed.map(({ drop }) => drop)),
        attempts: () => pool.connectAttempts,
        failConnects: (...errors) => pool.connectFailures.push(...errors),
      };
    },
  ],
];

describe.each(engines)('%s gateway', (_engine, setup) => {
  test('commits when the function resolves', async () => {
    const { db, gateway, releases } = setup();

    const result = await gateway.withTransaction(async (conn) => {
      await transfer(conn, 1, 2, 40);
      return 'done';
    });

    expect(result).toBe('done');
    expect(db.balance(1)).toBe(60);
    expect(db.balance(2)).toBe(40);
    expect(db.log[db.log.length - 1]).toBe('COMMIT');
    expect(releases()).toEqual([false]);
  });

  test('rows read the same on every engine', async () => {
    const { gateway } = setup();
    const row = await gateway.withTransaction((conn) => conn.one('SELECT balance FROM accounts WHERE id = ?', [1]));
    expect(row).toEqual({ balance: 100 });
  });

  test('rolls back every write when the function throws', async () => {
    const { db, gateway, releases } = setup();

    await expect(
      gateway.withTransaction(async (conn) => {
        await transfer(conn, 1, 2, 40);
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(db.balance(1)).toBe(100);
    expect(db.balance(2)).toBe(0);
    expect(db.log[db.log.length - 1]).toBe('ROLLBACK');
    expect(releases()).toEqual([false]);
  });

  test('one of two concurrent transactions failing leaves the other committed', async () => {
    const { db, gateway } = setup();

    const outcomes = await Promise.allSettled([
      gateway.withTransaction((conn) => conn.query('UPDATE accounts SET balance = ? WHERE id = ?', [75, 1])),
      gateway.withTransaction(async (conn) => {
        await conn.query('UPDATE accounts SET balance = ? WHERE id = ?', [25, 2]);
        throw new Error('second fails');
      }),
    ]);

    expect(outcomes.map((o) => o.status)).toEqual(['fulfilled', 'rejected']);
    expect(db.balance(1)).toBe(75);
    expect(db.balance(2)).toBe(0);
  });

  test('a connection whose rollback fails is discarded', async () => {
    const { db, gateway, releases } = setup();
    db.rollbackFailure = new Error('socket closed');

    await expect(
      gateway.withTransaction(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(releases()).toEqual([true]);
  });

  test('retries a transient acquisition failure once', async () => {
    const { gateway, attempts, failConnects } = setup();
    failConnects(driverError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:5432'));

    await gateway.withTransaction((conn) => conn.query('SELECT 1'));
    expect(attempts()).toBe(2);
  });

  test('gives up after the second failed acquisition', async () => {
    const { gateway, attempts, failConnects } = setup();
    failConnects(driverError('ECONNREFUSED'), driverError('ECONNREFUSED'));

    await expect(gateway.withTransaction((conn) => conn.query('SELECT 1'))).rejects.toMatchObject({ kind: 'ConnectionLost', status: 503 });
    expect(attempts()).toBe(2);
  });

  test('does not retry a permanent acquisition failure', async () => {
    const { gateway, attempts, failConnects } = setup();
    failConnects(new Error('password authentication failed'));

    await expect(gateway.withTransaction((conn) => conn.query('SELECT 1'))).rejects.toMatchObject({ kind: 'Other' });
    expect(attempts()).toBe(1);
  });

  test('a signal aborted up front never acquires a connection', async () => {
    const { gateway, attempts } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(gateway.withTransaction((conn) => conn.query('SELECT 1'), { signal: controller.signal })).rejects.toMatchObject({
      kind: 'Cancelled',
    });
    expect(attempts()).toBe(0);
  });

  test('a handle cannot be used after its transaction ends', async () => {
    const { gateway } = setup();
    const handle = await gateway.withTransaction(async (conn) => conn);

    await expect(handle.query('SELECT 1')).rejects.toMatchObject({ kind: 'Other', message: 'connection used after its transaction ended' });
  });

  test('one() on an empty result is NotFound', async () => {
    const { gateway } = setup();
    await expect(gateway.withTransaction((conn) => conn.one('SELECT balance FROM accounts WHERE id = ?', [99]))).rejects.toMatchObject({
      kind: 'NotFound',
    });
  });

  test('placeholder count must match the parameters', async () => {
    const { gateway } = setup();
    await expect(gateway.withTransaction((conn) => conn.query('SELECT balance FROM accounts WHERE id = ?', []))).rejects.toThrow(RangeError);
  });

  test('ping runs a trivial statement', async () => {
    const { db, gateway } = setup();
    await gateway.ping();
    expect(db.log).toEqual([gateway.engine === 'oracle' ? 'SELECT 1 FROM DUAL' : 'SELECT 1']);
  });

  test('ping reports an unreachable database', async () => {
    const { gateway, failConnects } = setup();
    failConnects(driverError('ECONNRESET'));
    await expect(gateway.ping()).rejects.toBeInstanceOf(DataError);
  });
});

describe('statement errors', () => {
  test('postgres unique violation is a Conflict', async () => {
    const db = new FakeDatabase({ 1: 100 });
    const pool = new FakePgPool(db);
    const gateway = new PostgresGateway(pool, { logger: silent });
    db.failNext(driverError('23505', 'duplicate key value violates unique constraint "accounts_pkey"'));

    const attempt = gateway.withTransaction((conn) => conn.query('UPDATE accounts SET balance = ? WHERE id = ?', [1, 1]));

    await expect(attempt).rejects.toMatchObject({
      kind: 'Conflict',
      status: 409,
      message: 'postgres: duplicate key value violates unique constraint "accounts_pkey"',
    });
    expect(db.log).toEqual(['BEGIN', 'UPDATE accounts SET balance = $1 WHERE id = $2', 'ROLLBACK']);
  });

  test('oracle unique violation is a Conflict', async () => {
    const db = new FakeDatabase({ 1: 100 });
    const gateway = new OracleGateway(new FakeOraclePool(db), { logger: silent });
    db.failNext(new Error('ORA-00001: unique constraint (APP.ACCOUNTS_PK) violated'));

    const attempt = gateway.withTransaction((conn) => conn.query('UPDATE accounts SET balance = ? WHERE id = ?', [1, 1]));

    await expect(attempt).rejects.toMatchObject({ kind: 'Conflict', status: 409 });
    expect(db.log).toEqual(['UPDATE accounts SET balance = :1 WHERE id = :2', 'ROLLBACK']);
  });
});

describe('cancellation', () => {
  test('postgres destroys a connection whose statement was abandoned', async () => {
    const db = new FakeDatabase({ 1: 100 });
    const pool = new FakePgPool(db);
    const gateway = new PostgresGateway(pool, { logger: silent });
    const controller = new AbortController();

    const attempt = gateway.withTransaction(
      (conn) => {
        const pending = conn.query('SELECT pending');
        controller.abort();
        return pending;
      },
      { signal: controller.signal },
    );

    await expect(attempt).rejects.toMatchObject({ kind: 'Cancelled', status: 503 });
    // the session may still be busy, so it is neither rolled back nor reused
    expect(db.log).toEqual(['BEGIN', 'SELECT pending']);
    expect(pool.clients[0]?.released).toEqual([true]);
  });

  test('oracle breaks the running call, rolls back and keeps the connection', async () => {
    const db = new FakeDatabase({ 1: 100 });
    const pool = new FakeOraclePool(db);
    const gateway = new OracleGateway(pool, { logger: silent });
    const controller = new AbortController();

    const attempt = gateway.withTransaction(
      async (conn) => {
        await conn.query('UPDATE accounts SET balance = ? WHERE id = ?', [0, 1]);
        const pending = conn.query('SELECT pending');
        controller.abort();
        return pending;
      },
      { signal: controller.signal },
    );

    await expect(attempt).rejects.toMatchObject({ kind: 'Cancelled' });
    expect(pool.connections[0]?.breaks).toBe(1);
    expect(pool.connections[0]?.closed).toEqual([{ drop: false }]);
    expect(db.balance(1)).toBe(100);
  });
});

describe('error normalization', () => {
  const pg = new PostgresGateway(new FakePgPool(new FakeDatabase()), { logger: silent });
  const oracle = new OracleGateway(new FakeOraclePool(new FakeDatabase()), { logger: silent });

  test.each([
    ['23503', 'Conflict'],
    ['40P01', 'Conflict'],
    ['57014', 'Timeout'],
    ['57P01', 'ConnectionLost'],
    ['ETIMEDOUT', 'Timeout'],
    ['42P01', 'Other'],
  ])('postgres code %s is %s', (code, kind) => {
    expect(pg.normalize(driverError(code)).kind).toBe(kind);
  });

  test('postgres driver messages without a code', () => {
    expect(pg.normalize(new Error('timeout exceeded when trying to connect')).kind).toBe('Timeout');
    expect(pg.normalize(new Error('Connection terminated unexpectedly')).kind).toBe('ConnectionLost');
  });

  test.each([
    ['ORA-01013: user requested cancel of current operation', 'Cancelled'],
    ['ORA-03113: end-of-file on communication channel', 'ConnectionLost'],
    ['NJS-040: connection request timeout', 'Timeout'],
    ['ORA-00942: table or view does not exist', 'Other'],
  ])('oracle message %s', (message, kind) => {
    expect(oracle.normalize(new Error(message)).kind).toBe(kind);
  });

  test('a DataError passes through unchanged', () => {
    const error = new DataError('NotFound', 'gone');
    expect(pg.normalize(error)).toBe(error);
    expect(oracle.normalize(error)).toBe(error);
  });
});
