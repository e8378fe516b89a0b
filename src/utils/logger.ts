/**
 * Logger Interface for Library Code
 *
 * Captures accept a Logger via dependency injection. The default one
 * (see capture/diagnostics.ts) writes past every active capture; tests
 * pass silent or mock loggers.
 */

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
