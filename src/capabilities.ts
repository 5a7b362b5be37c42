/**
 * Runtime capability checks for optional driver methods.
 *
 * The wrapped object is only known through the Driver / Tx interfaces, so
 * context-aware variants are detected on the concrete object at call time.
 */

import type {
  BeginTxCapable,
  ExecContextCapable,
  ExecDestination,
  ExecResult,
  Executor,
  QueryContext,
  QueryContextCapable,
  QueryDestination,
  Rows,
} from './types.js';
import { emptyDestinationError, missingCapabilityError } from './errors.js';

export function hasExecContext<T extends object>(target: T): target is T & ExecContextCapable {
  return 'execContext' in target && typeof target.execContext === 'function';
}

export function hasQueryContext<T extends object>(target: T): target is T & QueryContextCapable {
  return 'queryContext' in target && typeof target.queryContext === 'function';
}

export function hasBeginTx<T extends object>(target: T): target is T & BeginTxCapable {
  return 'beginTx' in target && typeof target.beginTx === 'function';
}

/** Guards against plain objects posing as drivers that lack a base method. */
export function hasMethod<T extends object>(target: T, name: string): boolean {
  return typeof Reflect.get(target, name) === 'function';
}

// ─── Dispatch With Fallback ──────────────────────────────────────────────────

/**
 * Run a statement through `execContext` when the target has it, otherwise
 * through `exec` with an output parameter.
 */
export async function dispatchExecContext(
  target: Executor,
  dialect: string,
  ctx: QueryContext,
  query: string,
  args: unknown[],
): Promise<ExecResult> {
  if (hasExecContext(target)) {
    return target.execContext(ctx, query, ...args);
  }
  if (!hasMethod(target, 'exec')) {
    throw missingCapabilityError('execContext', 'exec', dialect);
  }

  const dest: ExecDestination = {};
  await target.exec(ctx, query, args, dest);
  if (!dest.result) {
    throw emptyDestinationError('execContext', 'exec', dialect);
  }
  return dest.result;
}

/**
 * Run a statement through `queryContext` when the target has it, otherwise
 * through `query`, returning the cursor it stores in the destination.
 */
export async function dispatchQueryContext(
  target: Executor,
  dialect: string,
  ctx: QueryContext,
  query: string,
  args: unknown[],
): Promise<Rows> {
  if (hasQueryContext(target)) {
    return target.queryContext(ctx, query, ...args);
  }
  if (!hasMethod(target, 'query')) {
    throw missingCapabilityError('queryContext', 'query', dialect);
  }

  const dest: QueryDestination = {};
  await target.query(ctx, query, args, dest);
  if (!dest.rows) {
    throw emptyDestinationError('queryContext', 'query', dialect);
  }
  return dest.rows;
}
