/**
 * tsql-compat Configuration — zod-validated settings
 *
 * resolveConfig() fills defaults and rejects invalid values with a
 * VALIDATION_ERROR. loadConfigFromEnv() reads the same settings from
 * TSQL_COMPAT_* environment variables.
 */

import { z } from 'zod';
import type { CompatConfig } from './types.js';
import { configValidationError } from './errors.js';

export const DEFAULT_MSSQL_PORT = 1433;

const connectionSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(DEFAULT_MSSQL_PORT),
  user: z.string().min(1),
  password: z.string(),
  database: z.string().min(1),
  ssl: z.enum(['disable', 'prefer', 'require']).default('prefer'),
  pool: z.enum(['high', 'standard', 'low']).default('standard'),
});

export const compatConfigSchema = z.object({
  logging: z.union([z.boolean(), z.literal('verbose')]).default(true),
  debug: z.boolean().default(false),
  slowQueryMs: z.number().int().nonnegative().default(1000),
  connection: connectionSchema.optional(),
});

export type CompatConfigInput = z.input<typeof compatConfigSchema>;

export function resolveConfig(input: CompatConfigInput = {}): CompatConfig {
  const parsed = compatConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw configValidationError(parsed.error);
  }
  return parsed.data;
}

// ─── Environment ─────────────────────────────────────────────────────────────

const flag = z.enum(['true', 'false', '1', '0']).transform(v => v === 'true' || v === '1');

// An exported-but-empty variable (FOO=) counts as unset
function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(v => (v === '' ? undefined : v), schema.optional());
}

const envSchema = z.object({
  TSQL_COMPAT_LOGGING: optionalEnv(z.enum(['true', 'false', 'verbose'])),
  TSQL_COMPAT_DEBUG: optionalEnv(flag),
  TSQL_COMPAT_SLOW_QUERY_MS: optionalEnv(z.coerce.number().int().nonnegative()),
  TSQL_COMPAT_HOST: optionalEnv(z.string()),
  TSQL_COMPAT_PORT: optionalEnv(z.coerce.number().int()),
  TSQL_COMPAT_USER: optionalEnv(z.string()),
  TSQL_COMPAT_PASSWORD: z.string().optional(),
  TSQL_COMPAT_DATABASE: optionalEnv(z.string()),
  TSQL_COMPAT_SSL: optionalEnv(z.enum(['disable', 'prefer', 'require'])),
  TSQL_COMPAT_POOL: optionalEnv(z.enum(['high', 'standard', 'low'])),
});

/**
 * Build a config from environment variables. A connection block is only
 * produced when TSQL_COMPAT_HOST is set.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): CompatConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw configValidationError(parsed.error);
  }
  const e = parsed.data;

  const input: CompatConfigInput = {
    logging: e.TSQL_COMPAT_LOGGING === undefined
      ? undefined
      : e.TSQL_COMPAT_LOGGING === 'verbose' ? 'verbose' : e.TSQL_COMPAT_LOGGING === 'true',
    debug: e.TSQL_COMPAT_DEBUG,
    slowQueryMs: e.TSQL_COMPAT_SLOW_QUERY_MS,
  };

  if (e.TSQL_COMPAT_HOST) {
    input.connection = {
      host: e.TSQL_COMPAT_HOST,
      port: e.TSQL_COMPAT_PORT,
      user: e.TSQL_COMPAT_USER ?? '',
      password: e.TSQL_COMPAT_PASSWORD ?? '',
      database: e.TSQL_COMPAT_DATABASE ?? '',
      ssl: e.TSQL_COMPAT_SSL,
      pool: e.TSQL_COMPAT_POOL,
    };
  }

  return resolveConfig(input);
}
