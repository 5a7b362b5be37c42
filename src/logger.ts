/**
 * tsql-compat Logger — Structured statement logging
 *
 * Emits statement events with timing, and optionally the bound arguments.
 */

import type { StatementOperation } from './types.js';
import type { CompatEventEmitter } from './events.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowQueryMs: number;
}

export interface StatementRecord {
  operation: StatementOperation;
  query: string;
  args: readonly unknown[];
  durationMs: number;
  txId?: string;
  failed: boolean;
}

export class StatementLogger {
  private config: LoggerConfig;
  private emitter: CompatEventEmitter;

  constructor(config: LoggerConfig, emitter: CompatEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Log a completed statement. Arguments are only included in verbose mode.
   */
  logStatement(record: StatementRecord): void {
    if (!this.config.enabled) return;

    if (this.emitter.wants('statement')) {
      this.emitter.emit('statement', {
        operation: record.operation,
        query: record.query,
        args: this.config.verbose ? record.args : undefined,
        durationMs: record.durationMs,
        txId: record.txId,
        failed: record.failed,
      });
    }

    if (record.durationMs >= this.config.slowQueryMs && this.emitter.wants('slow-statement')) {
      this.emitter.emit('slow-statement', {
        operation: record.operation,
        query: record.query,
        durationMs: record.durationMs,
        threshold: this.config.slowQueryMs,
      });
    }
  }

  logTransaction(txId: string, action: 'begin' | 'commit' | 'rollback'): void {
    if (!this.config.enabled) return;
    this.emitter.emit('transaction', { txId, action });
  }
}
