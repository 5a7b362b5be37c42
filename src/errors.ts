/**
 * tsql-compat Error System — Normalized errors with fix instructions
 *
 * Statement errors raised by the wrapped driver are never converted: they
 * reach the caller as the original object. CompatError covers what this
 * package itself can get wrong: configuration, connecting, and drivers that
 * cannot serve a context-aware call.
 */

import type { ZodError } from 'zod';
import type { CompatErrorCode } from './types.js';

// ─── CompatError ─────────────────────────────────────────────────────────────

export class CompatError extends Error {
  readonly code: CompatErrorCode;
  readonly originalError: unknown;
  readonly operation?: string;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;

  constructor(opts: {
    code: CompatErrorCode;
    message: string;
    fix: string;
    originalError?: unknown;
    operation?: string;
    retryable?: boolean;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'CompatError';
    this.code = opts.code;
    this.originalError = opts.originalError;
    this.operation = opts.operation;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_RETRYABLE: Record<CompatErrorCode, boolean> = {
  UNSUPPORTED_OPERATION: false,
  VALIDATION_ERROR: false,
  CONNECTION_FAILED: true,
  AUTHENTICATION_FAILED: false,
  TIMEOUT: true,
  INTERNAL_ERROR: false,
};

// ─── Capability Errors ───────────────────────────────────────────────────────

/** The wrapped driver has neither the context-aware nor the base method. */
export function missingCapabilityError(operation: string, fallback: string, dialect: string): CompatError {
  return new CompatError({
    code: 'UNSUPPORTED_OPERATION',
    message: `Driver for dialect "${dialect}" implements neither ${operation}() nor ${fallback}().`,
    fix: `Wrap a driver that implements the Driver interface (exec, query, tx, dialect, close).`,
    operation,
  });
}

/** The base method ran but left its output parameter empty. */
export function emptyDestinationError(operation: string, fallback: string, dialect: string): CompatError {
  return new CompatError({
    code: 'UNSUPPORTED_OPERATION',
    message: `Driver for dialect "${dialect}" does not implement ${operation}() and its ${fallback}() returned no result.`,
    fix: `Implement ${operation}() on the driver, or make ${fallback}() fill the destination it is given.`,
    operation,
  });
}

// ─── Configuration Errors ────────────────────────────────────────────────────

export function configValidationError(err: ZodError): CompatError {
  const issues = err.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
  return new CompatError({
    code: 'VALIDATION_ERROR',
    message: `Invalid tsql-compat configuration: ${issues}.`,
    fix: `Correct the listed fields. See CompatConfig for accepted values.`,
    originalError: err,
  });
}

// ─── SQL Server Connection Errors ────────────────────────────────────────────

/**
 * Normalize a failure raised while opening the SQL Server pool. Only used on
 * the connect step; statement errors keep their native type.
 */
export function mapConnectError(err: unknown): CompatError {
  if (err instanceof CompatError) return err;

  const code = readStringField(err, 'code');
  const message = readStringField(err, 'message') || String(err);

  // tedious: ELOGIN on bad credentials
  if (code === 'ELOGIN' || message.includes('Login failed')) {
    return new CompatError({
      code: 'AUTHENTICATION_FAILED',
      message: `SQL Server authentication failed.`,
      fix: `Check the user and password in the connection config.`,
      originalError: err,
      operation: 'connect',
    });
  }

  if (code === 'ETIMEOUT' || message.includes('timed out')) {
    return new CompatError({
      code: 'TIMEOUT',
      message: `Timed out connecting to SQL Server.`,
      fix: `Verify the host and port are reachable from this machine.`,
      originalError: err,
      operation: 'connect',
    });
  }

  if (code === 'ESOCKET' || message.includes('ECONNREFUSED') || message.includes('getaddrinfo ENOTFOUND')) {
    return new CompatError({
      code: 'CONNECTION_FAILED',
      message: `Cannot connect to SQL Server.`,
      fix: `Verify the host and port are correct and the server is running. Check the ssl mode if the server enforces encryption.`,
      originalError: err,
      operation: 'connect',
    });
  }

  // Fallback
  return new CompatError({
    code: 'INTERNAL_ERROR',
    message: `SQL Server connection error: ${message}`,
    fix: `Check the original error for details.`,
    originalError: err,
    operation: 'connect',
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function readStringField(err: unknown, field: string): string {
  if (typeof err !== 'object' || err === null || !(field in err)) return '';
  const value: unknown = Reflect.get(err, field);
  return typeof value === 'string' ? value : '';
}
