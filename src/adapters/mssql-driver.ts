/**
 * tsql-compat SQL Server Adapter
 *
 * A Driver over the mssql package. Arguments bind by position to the named
 * parameters @p1…@pN that the compatibility layer produces, so this driver
 * expects already-rewritten T-SQL. Use it through buildDriverChain().
 *
 * Statement errors are the mssql package's own (RequestError, TransactionError)
 * and are not converted.
 */

import mssql from 'mssql';
import type { config as MssqlPoolConfig } from 'mssql';
import type {
  BeginTxCapable,
  ConnectionConfig,
  Driver,
  ExecContextCapable,
  ExecDestination,
  ExecResult,
  IsolationLevel,
  PoolPreset,
  QueryContext,
  QueryContextCapable,
  QueryDestination,
  Row,
  Rows,
  Tx,
  TxOptions,
} from '../types.js';
import type { CompatEventEmitter } from '../events.js';
import { ArrayRows } from '../rows.js';
import { CompatError, mapConnectError } from '../errors.js';

// ─── Structural View of mssql ────────────────────────────────────────────────

export interface MssqlRecordset extends Array<Row> {
  columns: Record<string, { index: number; name: string }>;
}

export interface MssqlResult {
  recordset?: MssqlRecordset;
  rowsAffected: number[];
}

export interface MssqlRequest {
  input(name: string, value: unknown): MssqlRequest;
  query(command: string): Promise<MssqlResult>;
  cancel(): void;
}

export interface MssqlTransaction {
  request(): MssqlRequest;
  begin(isolationLevel?: number): Promise<unknown>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface MssqlPool {
  request(): MssqlRequest;
  transaction(): MssqlTransaction;
  close(): Promise<void>;
}

// ─── Statement Helpers ───────────────────────────────────────────────────────

async function runStatement(
  request: MssqlRequest,
  ctx: QueryContext,
  query: string,
  args: readonly unknown[],
): Promise<MssqlResult> {
  const { signal } = ctx;
  signal?.throwIfAborted();

  args.forEach((value, i) => {
    request.input(`p${i + 1}`, value);
  });

  const onAbort = (): void => request.cancel();
  signal?.addEventListener('abort', onAbort, { once: true });
  try {
    return await request.query(query);
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}

function toExecResult(result: MssqlResult): ExecResult {
  return { rowsAffected: result.rowsAffected.reduce((sum, n) => sum + n, 0) };
}

function toRows(result: MssqlResult): Rows {
  // Statements without a result set (plain INSERT/UPDATE) leave recordset unset
  const recordset = result.recordset;
  if (!recordset) return new ArrayRows([], []);

  const columns = Object.values(recordset.columns)
    .sort((a, b) => a.index - b.index)
    .map(c => c.name);
  return new ArrayRows([...recordset], columns);
}

function isolationLevelOf(level: IsolationLevel | undefined): number | undefined {
  return level === undefined ? undefined : mssql.ISOLATION_LEVEL[level];
}

// ─── Statement Execution (shared by driver and transaction) ──────────────────

abstract class MssqlExecutor implements ExecContextCapable, QueryContextCapable {
  protected abstract request(): MssqlRequest;

  async exec(ctx: QueryContext, query: string, args: readonly unknown[], dest?: ExecDestination): Promise<void> {
    const result = await runStatement(this.request(), ctx, query, args);
    if (dest) dest.result = toExecResult(result);
  }

  async query(ctx: QueryContext, query: string, args: readonly unknown[], dest: QueryDestination): Promise<void> {
    const result = await runStatement(this.request(), ctx, query, args);
    dest.rows = toRows(result);
  }

  async execContext(ctx: QueryContext, query: string, ...args: unknown[]): Promise<ExecResult> {
    return toExecResult(await runStatement(this.request(), ctx, query, args));
  }

  async queryContext(ctx: QueryContext, query: string, ...args: unknown[]): Promise<Rows> {
    return toRows(await runStatement(this.request(), ctx, query, args));
  }
}

// ─── Driver ──────────────────────────────────────────────────────────────────

export class MssqlDriver extends MssqlExecutor implements Driver, BeginTxCapable {
  private pool: MssqlPool;

  constructor(pool: MssqlPool) {
    super();
    this.pool = pool;
  }

  dialect(): string {
    return 'mssql';
  }

  tx(ctx: QueryContext): Promise<Tx> {
    return this.beginTx(ctx);
  }

  async beginTx(ctx: QueryContext, opts?: TxOptions): Promise<Tx> {
    ctx.signal?.throwIfAborted();
    if (opts?.readOnly) {
      throw new CompatError({
        code: 'UNSUPPORTED_OPERATION',
        message: `SQL Server does not support read-only transactions.`,
        fix: `Begin the transaction without readOnly, or use a SNAPSHOT isolation level for consistent reads.`,
        operation: 'beginTx',
      });
    }

    const transaction = this.pool.transaction();
    await transaction.begin(isolationLevelOf(opts?.isolationLevel));
    return new MssqlTx(transaction);
  }

  close(): Promise<void> {
    return this.pool.close();
  }

  protected request(): MssqlRequest {
    return this.pool.request();
  }
}

// ─── Transaction ─────────────────────────────────────────────────────────────

export class MssqlTx extends MssqlExecutor implements Tx {
  private transaction: MssqlTransaction;

  constructor(transaction: MssqlTransaction) {
    super();
    this.transaction = transaction;
  }

  commit(): Promise<void> {
    return this.transaction.commit();
  }

  rollback(): Promise<void> {
    return this.transaction.rollback();
  }

  protected request(): MssqlRequest {
    return this.transaction.request();
  }
}

// ─── Connecting ──────────────────────────────────────────────────────────────

const POOL_SIZES: Record<PoolPreset, { max: number; min: number }> = {
  high: { max: 100, min: 10 },
  standard: { max: 50, min: 2 },
  low: { max: 10, min: 0 },
};

/**
 * Translate connection settings into an mssql pool config. `prefer` and
 * `disable` both leave the connection unencrypted; `require` encrypts.
 * Server certificates are never blindly trusted.
 */
export function toPoolConfig(connection: ConnectionConfig): MssqlPoolConfig {
  return {
    server: connection.host,
    port: connection.port,
    user: connection.user,
    password: connection.password,
    database: connection.database,
    options: {
      encrypt: connection.ssl === 'require',
      trustServerCertificate: false,
    },
    pool: {
      ...POOL_SIZES[connection.pool],
      idleTimeoutMillis: 30000,
    },
  };
}

export async function openMssqlDriver(
  connection: ConnectionConfig,
  emitter?: CompatEventEmitter,
): Promise<MssqlDriver> {
  const pool = new mssql.ConnectionPool(toPoolConfig(connection));
  try {
    await pool.connect();
  } catch (err) {
    throw mapConnectError(err);
  }

  emitter?.emit('connected', {
    dialect: 'mssql',
    server: connection.host,
    database: connection.database,
  });
  return new MssqlDriver(pool);
}
