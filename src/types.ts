/**
 * tsql-compat — All shared types and interfaces
 *
 * This is the ONLY file every other file imports.
 * No circular dependencies. No file imports from an adapter.
 */

// ─── Context & Results ───────────────────────────────────────────────────────

/** Caller-supplied cancellation context. Forwarded to the driver untouched. */
export interface QueryContext {
  readonly signal?: AbortSignal;
}

export interface ExecResult {
  rowsAffected: number;
}

export type Row = Record<string, unknown>;

export interface Rows extends AsyncIterable<Row> {
  readonly columns: readonly string[];
  next(): Promise<Row | undefined>;
  close(): Promise<void>;
}

// ─── Output Parameters ───────────────────────────────────────────────────────

/** Filled by `Driver.exec` when the caller wants the result back. */
export interface ExecDestination {
  result?: ExecResult;
}

/** Filled by `Driver.query` with the cursor over the returned rows. */
export interface QueryDestination {
  rows?: Rows;
}

// ─── Transactions ────────────────────────────────────────────────────────────

export type IsolationLevel =
  | 'READ_UNCOMMITTED'
  | 'READ_COMMITTED'
  | 'REPEATABLE_READ'
  | 'SERIALIZABLE'
  | 'SNAPSHOT';

export interface TxOptions {
  isolationLevel?: IsolationLevel;
  readOnly?: boolean;
}

// ─── Driver Contract ─────────────────────────────────────────────────────────

/** Statement execution shared by drivers and transactions. */
export interface Executor {
  exec(ctx: QueryContext, query: string, args: readonly unknown[], dest?: ExecDestination): Promise<void>;
  query(ctx: QueryContext, query: string, args: readonly unknown[], dest: QueryDestination): Promise<void>;
}

export interface Tx extends Executor {
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface Driver extends Executor {
  /** Dialect label, e.g. "mssql", "mysql", "sqlite3". */
  dialect(): string;
  tx(ctx: QueryContext): Promise<Tx>;
  close(): Promise<void>;
}

// ─── Optional Capabilities ───────────────────────────────────────────────────

export interface ExecContextCapable {
  execContext(ctx: QueryContext, query: string, ...args: unknown[]): Promise<ExecResult>;
}

export interface QueryContextCapable {
  queryContext(ctx: QueryContext, query: string, ...args: unknown[]): Promise<Rows>;
}

export interface BeginTxCapable {
  beginTx(ctx: QueryContext, opts?: TxOptions): Promise<Tx>;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export type PoolPreset = 'high' | 'standard' | 'low';
export type SslMode = 'disable' | 'prefer' | 'require';

export interface ConnectionConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: SslMode;
  pool: PoolPreset;
}

export interface CompatConfig {
  logging: boolean | 'verbose';
  debug: boolean;
  slowQueryMs: number;
  connection?: ConnectionConfig;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type CompatErrorCode =
  | 'UNSUPPORTED_OPERATION'
  | 'VALIDATION_ERROR'
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT'
  | 'INTERNAL_ERROR';

// ─── Event Types ─────────────────────────────────────────────────────────────

export type StatementOperation = 'exec' | 'execContext' | 'query' | 'queryContext';

export interface CompatEvents {
  connected: { dialect: string; server: string; database: string };
  statement: {
    operation: StatementOperation;
    query: string;
    args?: readonly unknown[];
    durationMs: number;
    txId?: string;
    failed: boolean;
  };
  'slow-statement': { operation: StatementOperation; query: string; durationMs: number; threshold: number };
  transaction: { txId: string; action: 'begin' | 'commit' | 'rollback' };
}
