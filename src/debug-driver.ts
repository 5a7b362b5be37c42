/**
 * Debug driver — logs every statement that reaches the database
 *
 * Wrap the base driver with it and hand the result to withMssqlCompat(), so
 * the logged text is the rewritten statement the server actually receives.
 * Each transaction gets its own id so its statements can be grouped.
 */

import { randomUUID } from 'crypto';
import type {
  BeginTxCapable,
  Driver,
  ExecContextCapable,
  ExecDestination,
  ExecResult,
  QueryContext,
  QueryContextCapable,
  QueryDestination,
  Rows,
  StatementOperation,
  Tx,
  TxOptions,
} from './types.js';
import type { StatementLogger } from './logger.js';
import { dispatchExecContext, dispatchQueryContext, hasBeginTx } from './capabilities.js';

interface TraceEntry {
  operation: StatementOperation;
  query: string;
  args: readonly unknown[];
  txId?: string;
}

async function traced<R>(logger: StatementLogger, entry: TraceEntry, run: () => Promise<R>): Promise<R> {
  if (!logger.enabled) return run();

  const startTime = Date.now();
  let failed = true;
  try {
    const result = await run();
    failed = false;
    return result;
  } finally {
    logger.logStatement({ ...entry, durationMs: Date.now() - startTime, failed });
  }
}

export class DebugDriver implements Driver, ExecContextCapable, QueryContextCapable, BeginTxCapable {
  private readonly target: Driver;
  private readonly logger: StatementLogger;

  constructor(target: Driver, logger: StatementLogger) {
    this.target = target;
    this.logger = logger;
  }

  dialect(): string {
    return this.target.dialect();
  }

  exec(ctx: QueryContext, query: string, args: readonly unknown[], dest?: ExecDestination): Promise<void> {
    return traced(this.logger, { operation: 'exec', query, args }, () =>
      this.target.exec(ctx, query, args, dest));
  }

  query(ctx: QueryContext, query: string, args: readonly unknown[], dest: QueryDestination): Promise<void> {
    return traced(this.logger, { operation: 'query', query, args }, () =>
      this.target.query(ctx, query, args, dest));
  }

  execContext(ctx: QueryContext, query: string, ...args: unknown[]): Promise<ExecResult> {
    return traced(this.logger, { operation: 'execContext', query, args }, () =>
      dispatchExecContext(this.target, this.target.dialect(), ctx, query, args));
  }

  queryContext(ctx: QueryContext, query: string, ...args: unknown[]): Promise<Rows> {
    return traced(this.logger, { operation: 'queryContext', query, args }, () =>
      dispatchQueryContext(this.target, this.target.dialect(), ctx, query, args));
  }

  async tx(ctx: QueryContext): Promise<Tx> {
    const tx = await this.target.tx(ctx);
    return this.trace(tx);
  }

  async beginTx(ctx: QueryContext, opts?: TxOptions): Promise<Tx> {
    const tx = hasBeginTx(this.target)
      ? await this.target.beginTx(ctx, opts)
      : await this.target.tx(ctx);
    return this.trace(tx);
  }

  close(): Promise<void> {
    return this.target.close();
  }

  private trace(tx: Tx): DebugTx {
    const txId = randomUUID();
    this.logger.logTransaction(txId, 'begin');
    return new DebugTx(tx, this.logger, txId, this.target.dialect());
  }
}

export class DebugTx implements Tx, ExecContextCapable, QueryContextCapable {
  readonly id: string;
  private readonly target: Tx;
  private readonly logger: StatementLogger;
  private readonly dialectLabel: string;

  constructor(target: Tx, logger: StatementLogger, id: string, dialectLabel: string) {
    this.target = target;
    this.logger = logger;
    this.id = id;
    this.dialectLabel = dialectLabel;
  }

  exec(ctx: QueryContext, query: string, args: readonly unknown[], dest?: ExecDestination): Promise<void> {
    return traced(this.logger, { operation: 'exec', query, args, txId: this.id }, () =>
      this.target.exec(ctx, query, args, dest));
  }

  query(ctx: QueryContext, query: string, args: readonly unknown[], dest: QueryDestination): Promise<void> {
    return traced(this.logger, { operation: 'query', query, args, txId: this.id }, () =>
      this.target.query(ctx, query, args, dest));
  }

  execContext(ctx: QueryContext, query: string, ...args: unknown[]): Promise<ExecResult> {
    return traced(this.logger, { operation: 'execContext', query, args, txId: this.id }, () =>
      dispatchExecContext(this.target, this.dialectLabel, ctx, query, args));
  }

  queryContext(ctx: QueryContext, query: string, ...args: unknown[]): Promise<Rows> {
    return traced(this.logger, { operation: 'queryContext', query, args, txId: this.id }, () =>
      dispatchQueryContext(this.target, this.dialectLabel, ctx, query, args));
  }

  async commit(): Promise<void> {
    await this.target.commit();
    this.logger.logTransaction(this.id, 'commit');
  }

  async rollback(): Promise<void> {
    await this.target.rollback();
    this.logger.logTransaction(this.id, 'rollback');
  }
}
