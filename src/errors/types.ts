/**
 * Error type definitions for console capture
 *
 * Every error carries:
 * - A recovery hint for the developer wiring up the capture
 * - A numeric code (sysexits-style) for programmatic handling
 */

/**
 * Base class for all capture errors.
 */
export class CaptureError extends Error {
  /** Recovery suggestion */
  public readonly hint?: string;

  /** Numeric error code (sysexits-style) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CaptureError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when install/uninstall are called out of order.
 *
 * Code 64: EX_USAGE
 */
export class UsageError extends CaptureError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Pair every install() with exactly one uninstall()', 64);
    this.name = 'UsageError';
  }
}

/**
 * Thrown when the descriptor-level redirect is requested on a platform
 * (or stream) that has no usable file descriptor.
 *
 * Code 69: EX_UNAVAILABLE
 */
export class UnsupportedPlatformError extends CaptureError {
  constructor(feature: string, platform: string) {
    super(
      `${feature} is not supported on ${platform}`,
      "Use the 'wrap' console mode instead",
      69
    );
    this.name = 'UnsupportedPlatformError';
  }
}

/**
 * Wraps an exception raised by a line callback.
 *
 * Never thrown to the writer; the dispatcher reports it and moves on.
 *
 * Code 70: EX_SOFTWARE
 */
export class CallbackError extends CaptureError {
  /** The original error raised by the callback */
  public readonly cause?: unknown;

  /** Position of the failing callback in registration order */
  public readonly index: number;

  constructor(index: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Line callback #${index} failed: ${reason}`,
      'Remaining callbacks still received the line',
      70
    );
    this.name = 'CallbackError';
    this.index = index;
    this.cause = cause;
  }
}

/**
 * Raised when the descriptor pump cannot read its pipe or forward bytes
 * to the original descriptor.
 *
 * Code 74: EX_IOERR
 */
export class PumpError extends CaptureError {
  public readonly cause?: unknown;

  constructor(streamName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Output pump for ${streamName} stopped: ${reason}`,
      'The original descriptor was restored; further output is not captured',
      74
    );
    this.name = 'PumpError';
    this.cause = cause;
  }
}

/**
 * Thrown for configuration file errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Config file path that does not exist
 * - Values outside their allowed range
 *
 * Code 78: EX_CONFIG
 */
export class ConfigError extends CaptureError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Check the [capture] settings in your config file', 78);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when option validation fails.
 *
 * Used with Zod schemas to provide field-level errors.
 *
 * Code 65: EX_DATAERR
 */
export class ValidationError extends CaptureError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check the capture options and try again';
    super(message, hint, 65);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
