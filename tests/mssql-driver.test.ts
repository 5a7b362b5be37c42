/**
 * SQL Server Adapter Tests — against an in-process stand-in for the mssql pool
 */

import { describe, it, expect } from 'vitest';
import mssql from 'mssql';
import {
  MssqlDriver,
  toPoolConfig,
  type MssqlPool,
  type MssqlRecordset,
  type MssqlRequest,
  type MssqlResult,
  type MssqlTransaction,
} from '../src/adapters/mssql-driver.js';
import { withMssqlCompat } from '../src/compat-driver.js';
import { collectRows } from '../src/rows.js';
import type { ExecDestination, QueryDestination, Row } from '../src/types.js';

// ─── Stand-ins ───────────────────────────────────────────────────────────────

class FakeRequest implements MssqlRequest {
  readonly inputs: Array<[string, unknown]> = [];
  readonly queries: string[] = [];
  cancelled = false;
  private readonly result: MssqlResult;
  private readonly hang: boolean;
  private rejectPending?: (err: Error) => void;

  constructor(result: MssqlResult, hang: boolean) {
    this.result = result;
    this.hang = hang;
  }

  input(name: string, value: unknown): MssqlRequest {
    this.inputs.push([name, value]);
    return this;
  }

  query(command: string): Promise<MssqlResult> {
    this.queries.push(command);
    if (!this.hang) return Promise.resolve(this.result);
    return new Promise((_resolve, reject) => {
      this.rejectPending = reject;
    });
  }

  cancel(): void {
    this.cancelled = true;
    this.rejectPending?.(new Error('Canceled.'));
  }
}

class FakeTransaction implements MssqlTransaction {
  readonly requests: FakeRequest[] = [];
  beganWith: number | undefined;
  committed = false;
  rolledBack = false;
  private readonly result: MssqlResult;

  constructor(result: MssqlResult) {
    this.result = result;
  }

  request(): MssqlRequest {
    const request = new FakeRequest(this.result, false);
    this.requests.push(request);
    return request;
  }

  async begin(isolationLevel?: number): Promise<unknown> {
    this.beganWith = isolationLevel;
    return this;
  }

  async commit(): Promise<void> {
    this.committed = true;
  }

  async rollback(): Promise<void> {
    this.rolledBack = true;
  }
}

class FakePool implements MssqlPool {
  readonly requests: FakeRequest[] = [];
  readonly transactions: FakeTransaction[] = [];
  closed = false;
  hang = false;
  private readonly result: MssqlResult;

  constructor(result: MssqlResult = { rowsAffected: [] }) {
    this.result = result;
  }

  request(): MssqlRequest {
    const request = new FakeRequest(this.result, this.hang);
    this.requests.push(request);
    return request;
  }

  transaction(): MssqlTransaction {
    const transaction = new FakeTransaction(this.result);
    this.transactions.push(transaction);
    return transaction;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function recordset(rows: Row[], columns: MssqlRecordset['columns']): MssqlRecordset {
  return Object.assign([...rows], { columns });
}

const ctx = {};

// ─── Statements ──────────────────────────────────────────────────────────────

describe('MssqlDriver statements', () => {
  it('binds arguments to @p1…@pN in order', async () => {
    const pool = new FakePool();
    await new MssqlDriver(pool).exec(ctx, 'UPDATE t SET a = @p1 WHERE id = @p2', ['x', 42]);

    expect(pool.requests[0]?.inputs).toEqual([['p1', 'x'], ['p2', 42]]);
    expect(pool.requests[0]?.queries).toEqual(['UPDATE t SET a = @p1 WHERE id = @p2']);
  });

  it('sums rowsAffected across statements', async () => {
    const driver = new MssqlDriver(new FakePool({ rowsAffected: [2, 3] }));
    const dest: ExecDestination = {};
    await driver.exec(ctx, 'DELETE FROM t', [], dest);
    expect(dest.result).toEqual({ rowsAffected: 5 });
    expect(await driver.execContext(ctx, 'DELETE FROM t')).toEqual({ rowsAffected: 5 });
  });

  it('orders columns by their position in the result set', async () => {
    const rows = recordset([{ b: 1, a: 2 }], {
      a: { index: 1, name: 'a' },
      b: { index: 0, name: 'b' },
    });
    const driver = new MssqlDriver(new FakePool({ recordset: rows, rowsAffected: [1] }));
    const dest: QueryDestination = {};
    await driver.query(ctx, 'SELECT b, a FROM t', [], dest);

    expect(dest.rows?.columns).toEqual(['b', 'a']);
    const collected = dest.rows ? await collectRows(dest.rows) : [];
    expect(collected).toEqual([{ b: 1, a: 2 }]);
  });

  it('returns an empty cursor when there is no result set', async () => {
    const driver = new MssqlDriver(new FakePool({ rowsAffected: [1] }));
    const rows = await driver.queryContext(ctx, 'UPDATE t SET a = 1');
    expect(rows.columns).toEqual([]);
    expect(await collectRows(rows)).toEqual([]);
  });

  it('does not run a statement when the signal is already aborted', async () => {
    const pool = new FakePool();
    const controller = new AbortController();
    controller.abort();

    await expect(new MssqlDriver(pool).exec({ signal: controller.signal }, 'SELECT 1', []))
      .rejects.toMatchObject({ name: 'AbortError' });
    expect(pool.requests[0]?.queries).toEqual([]);
  });

  it('cancels the running request when the signal aborts', async () => {
    const pool = new FakePool();
    pool.hang = true;
    const controller = new AbortController();

    const pending = new MssqlDriver(pool).exec({ signal: controller.signal }, "WAITFOR DELAY '00:01'", []);
    controller.abort();

    await expect(pending).rejects.toThrow('Canceled.');
    expect(pool.requests[0]?.cancelled).toBe(true);
  });

  it('closes the pool', async () => {
    const pool = new FakePool();
    await new MssqlDriver(pool).close();
    expect(pool.closed).toBe(true);
  });
});

// ─── Transactions ────────────────────────────────────────────────────────────

describe('MssqlDriver transactions', () => {
  it('begins with the mapped isolation level', async () => {
    const pool = new FakePool();
    await new MssqlDriver(pool).beginTx(ctx, { isolationLevel: 'SERIALIZABLE' });
    expect(pool.transactions[0]?.beganWith).toBe(mssql.ISOLATION_LEVEL.SERIALIZABLE);
  });

  it('begins with the server default when no level is given', async () => {
    const pool = new FakePool();
    await new MssqlDriver(pool).tx(ctx);
    expect(pool.transactions).toHaveLength(1);
    expect(pool.transactions[0]?.beganWith).toBeUndefined();
  });

  it('rejects read-only transactions', async () => {
    const pool = new FakePool();
    await expect(new MssqlDriver(pool).beginTx(ctx, { readOnly: true }))
      .rejects.toMatchObject({ code: 'UNSUPPORTED_OPERATION', operation: 'beginTx' });
    expect(pool.transactions).toHaveLength(0);
  });

  it('runs statements on the transaction and commits', async () => {
    const pool = new FakePool({ rowsAffected: [1] });
    const tx = await new MssqlDriver(pool).tx(ctx);
    await tx.exec(ctx, 'UPDATE t SET a = @p1', [7]);
    await tx.commit();

    const transaction = pool.transactions[0];
    expect(pool.requests).toHaveLength(0);
    expect(transaction?.requests[0]?.inputs).toEqual([['p1', 7]]);
    expect(transaction?.committed).toBe(true);
    expect(transaction?.rolledBack).toBe(false);
  });

  it('rolls back', async () => {
    const pool = new FakePool();
    const tx = await new MssqlDriver(pool).tx(ctx);
    await tx.rollback();
    expect(pool.transactions[0]?.rolledBack).toBe(true);
  });
});

// ─── Through the compatibility layer ─────────────────────────────────────────

describe('MssqlDriver behind withMssqlCompat', () => {
  it('receives rewritten statements and positional bindings', async () => {
    const pool = new FakePool({ rowsAffected: [1] });
    const driver = withMssqlCompat(new MssqlDriver(pool));
    await driver.exec(ctx, 'UPDATE `t` SET `a` = ? WHERE `id` = ?', ['x', 9]);

    expect(pool.requests[0]?.queries).toEqual(['UPDATE [t] SET [a] = @p1 WHERE [id] = @p2']);
    expect(pool.requests[0]?.inputs).toEqual([['p1', 'x'], ['p2', 9]]);
  });

  it('returns the inserted id through the OUTPUT clause', async () => {
    const rows = recordset([{ id: 7 }], { id: { index: 0, name: 'id' } });
    const pool = new FakePool({ recordset: rows, rowsAffected: [1] });
    const driver = withMssqlCompat(new MssqlDriver(pool));
    const dest: QueryDestination = {};
    await driver.query(ctx, 'INSERT INTO `t` (`a`) VALUES (?)', ['x'], dest);

    expect(pool.requests[0]?.queries).toEqual(['INSERT INTO [t] ([a]) OUTPUT INSERTED.[id] VALUES (@p1)']);
    const collected = dest.rows ? await collectRows(dest.rows) : [];
    expect(collected).toEqual([{ id: 7 }]);
  });
});

// ─── Pool config ─────────────────────────────────────────────────────────────

describe('toPoolConfig', () => {
  const base = {
    host: 'db.local',
    port: 1433,
    user: 'app',
    password: 'test-secret',
    database: 'files',
  };

  it('maps connection settings and the pool preset', () => {
    expect(toPoolConfig({ ...base, ssl: 'require', pool: 'low' })).toEqual({
      server: 'db.local',
      port: 1433,
      user: 'app',
      password: 'test-secret',
      database: 'files',
      options: { encrypt: true, trustServerCertificate: false },
      pool: { max: 10, min: 0, idleTimeoutMillis: 30000 },
    });
  });

  it('leaves prefer and disable unencrypted', () => {
    expect(toPoolConfig({ ...base, ssl: 'prefer', pool: 'standard' }).options?.encrypt).toBe(false);
    expect(toPoolConfig({ ...base, ssl: 'disable', pool: 'high' }).pool).toEqual({
      max: 100,
      min: 10,
      idleTimeoutMillis: 30000,
    });
  });
});
