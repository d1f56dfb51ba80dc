/**
 * Loggers for library operations
 */

import type { Logger } from '@yamlnote/types';

/**
 * No-op logger for when logging is not needed
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Simple console-based logger
 */
export const consoleLogger: Logger = {
  debug: (message: string) => console.debug(`[debug] ${message}`),
  info: (message: string) => console.log(`[info] ${message}`),
  warn: (message: string) => console.warn(`[warn] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
};

/**
 * Prefix every message with a scope tag, e.g. `[documents] appended ...`
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  return {
    debug: (message: string) => logger.debug(`[${scope}] ${message}`),
    info: (message: string) => logger.info(`[${scope}] ${message}`),
    warn: (message: string) => logger.warn(`[${scope}] ${message}`),
    error: (message: string) => logger.error(`[${scope}] ${message}`),
  };
}
