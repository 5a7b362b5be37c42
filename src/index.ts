/**
 * tsql-compat — Public API Entry Point
 *
 * Run MySQL-flavoured ORM statements against SQL Server.
 */

// Driver wrappers
export { withMssqlCompat, MssqlCompatDriver, MssqlCompatTx } from './compat-driver.js';
export { DebugDriver, DebugTx } from './debug-driver.js';
export { buildDriverChain } from './driver-chain.js';

// Statement rewriting
export { translate } from './translate.js';
export { rewriteLimit } from './limit.js';
export { injectOutputClause } from './output-clause.js';
export { rewriteExec, rewriteQuery } from './rewrite.js';
export { isMssqlDialect, normalizeDialect, MSSQL_DIALECTS } from './dialect.js';

// SQL Server adapter
export { MssqlDriver, MssqlTx, openMssqlDriver, toPoolConfig } from './adapters/mssql-driver.js';

// Configuration, logging, errors
export { resolveConfig, loadConfigFromEnv, compatConfigSchema } from './config.js';
export type { CompatConfigInput } from './config.js';
export { CompatEventEmitter } from './events.js';
export type { CompatEventName, CompatListener } from './events.js';
export { StatementLogger } from './logger.js';
export { CompatError } from './errors.js';
export { ArrayRows, collectRows } from './rows.js';

// Types
export type {
  BeginTxCapable,
  CompatConfig,
  CompatErrorCode,
  CompatEvents,
  ConnectionConfig,
  Driver,
  ExecContextCapable,
  ExecDestination,
  ExecResult,
  Executor,
  IsolationLevel,
  PoolPreset,
  QueryContext,
  QueryContextCapable,
  QueryDestination,
  Row,
  Rows,
  SslMode,
  StatementOperation,
  Tx,
  TxOptions,
} from './types.js';
