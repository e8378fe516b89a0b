/**
 * Error handling module
 *
 * Usage:
 *   import { UsageError, formatError } from './errors/index.js';
 *
 *   throw new UsageError('uninstall() called before install()');
 */

// Error types
export {
  CaptureError,
  UsageError,
  UnsupportedPlatformError,
  CallbackError,
  PumpError,
  ConfigError,
  ValidationError,
} from './types.js';

// Formatting utilities
export {
  formatError,
  getErrorCode,
  type ErrorFormatOptions,
  type ErrorOutput,
} from './handler.js';
