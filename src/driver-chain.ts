/**
 * Driver chain — the order the wrappers are applied in
 *
 *   caller → MssqlCompatDriver → DebugDriver (debug mode only) → base driver
 *
 * The debug layer sits below the rewrite so logged statements show the final
 * text sent to the server.
 */

import type { CompatConfig, Driver } from './types.js';
import { withMssqlCompat } from './compat-driver.js';
import { DebugDriver } from './debug-driver.js';
import { StatementLogger } from './logger.js';
import type { CompatEventEmitter } from './events.js';

export function buildDriverChain(base: Driver, config: CompatConfig, emitter: CompatEventEmitter): Driver {
  if (!config.debug) return withMssqlCompat(base);

  const logger = new StatementLogger(
    {
      enabled: config.logging !== false,
      verbose: config.logging === 'verbose',
      slowQueryMs: config.slowQueryMs,
    },
    emitter,
  );
  return withMssqlCompat(new DebugDriver(base, logger));
}
