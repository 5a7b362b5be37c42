/**
 * SQL Server compatibility driver
 *
 * Decorates a Driver whose dialect is SQL Server so that every statement the
 * ORM sends is rewritten from MySQL surface syntax before it reaches the
 * server. Drivers for any other dialect are returned untouched.
 *
 *   ORM → MssqlCompatDriver → rewrite → wrapped driver
 *
 * Transactions opened through the wrapper are wrapped too, so statements run
 * inside a transaction get the same rewrite.
 *
 * Arguments, destinations and contexts are forwarded as received. Errors from
 * the wrapped driver propagate as the original object.
 */

import type {
  BeginTxCapable,
  Driver,
  ExecContextCapable,
  ExecDestination,
  ExecResult,
  Executor,
  QueryContext,
  QueryContextCapable,
  QueryDestination,
  Rows,
  Tx,
  TxOptions,
} from './types.js';
import { rewriteExec, rewriteQuery } from './rewrite.js';
import { isMssqlDialect } from './dialect.js';
import { dispatchExecContext, dispatchQueryContext, hasBeginTx } from './capabilities.js';

/**
 * Apply the SQL Server rewrite layer to `driver`. For other dialects the same
 * reference is returned and nothing is allocated.
 */
export function withMssqlCompat(driver: Driver): Driver {
  const dialect = driver.dialect();
  if (!isMssqlDialect(dialect)) return driver;
  return new MssqlCompatDriver(driver, dialect);
}

// ─── Shared Statement Rewriting ──────────────────────────────────────────────

abstract class RewritingExecutor<T extends Executor>
  implements Executor, ExecContextCapable, QueryContextCapable {
  protected readonly target: T;
  protected readonly dialectLabel: string;

  constructor(target: T, dialectLabel: string) {
    this.target = target;
    this.dialectLabel = dialectLabel;
  }

  exec(ctx: QueryContext, query: string, args: readonly unknown[], dest?: ExecDestination): Promise<void> {
    return this.target.exec(ctx, rewriteExec(query), args, dest);
  }

  query(ctx: QueryContext, query: string, args: readonly unknown[], dest: QueryDestination): Promise<void> {
    return this.target.query(ctx, rewriteQuery(query), args, dest);
  }

  execContext(ctx: QueryContext, query: string, ...args: unknown[]): Promise<ExecResult> {
    return dispatchExecContext(this.target, this.dialectLabel, ctx, rewriteExec(query), args);
  }

  queryContext(ctx: QueryContext, query: string, ...args: unknown[]): Promise<Rows> {
    return dispatchQueryContext(this.target, this.dialectLabel, ctx, rewriteQuery(query), args);
  }
}

// ─── Driver Wrapper ──────────────────────────────────────────────────────────

export class MssqlCompatDriver extends RewritingExecutor<Driver> implements Driver, BeginTxCapable {
  /** The driver this wrapper delegates to. */
  get wrapped(): Driver {
    return this.target;
  }

  dialect(): string {
    return this.target.dialect();
  }

  async tx(ctx: QueryContext): Promise<Tx> {
    const tx = await this.target.tx(ctx);
    return new MssqlCompatTx(tx, this.dialectLabel);
  }

  async beginTx(ctx: QueryContext, opts?: TxOptions): Promise<Tx> {
    if (hasBeginTx(this.target)) {
      const tx = await this.target.beginTx(ctx, opts);
      return new MssqlCompatTx(tx, this.dialectLabel);
    }
    return this.tx(ctx);
  }

  close(): Promise<void> {
    return this.target.close();
  }
}

// ─── Transaction Wrapper ─────────────────────────────────────────────────────

export class MssqlCompatTx extends RewritingExecutor<Tx> implements Tx {
  get wrapped(): Tx {
    return this.target;
  }

  commit(): Promise<void> {
    return this.target.commit();
  }

  rollback(): Promise<void> {
    return this.target.rollback();
  }
}
