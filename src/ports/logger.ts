/**
 * Logger Port
 *
 * The reward core depends only on the narrow Logger interface; adapters are
 * pino (production) or the no-op logger below (tests, embedding).
 */

import type { Logger } from '../types/logger.js';

/**
 * Create a no-op logger (for testing or disabling logs).
 */
export function createNoOpLogger(): Logger {
  const noop = (): void => {
    /* intentionally empty */
  };
  const noopLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => noopLogger,
  };
  return noopLogger;
}
