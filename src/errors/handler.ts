/**
 * Error formatting for diagnostic output
 *
 * Captures never throw from inside a write path; failures there are
 * formatted with these helpers and handed to a Logger instead.
 */

import chalk from 'chalk';
import { CaptureError } from './types.js';

export interface ErrorFormatOptions {
  /** Append the stack, indented, below the message */
  verbose?: boolean;
  /** Render one JSON object per error, for structured log sinks */
  json?: boolean;
}

/**
 * Fields reported for an error, whatever was thrown.
 */
export interface ErrorOutput {
  error: string;
  name: string;
  code: number;
  hint?: string;
  stack?: string;
}

function describeError(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof Error) {
    return {
      error: error.message,
      name: error.name,
      code: getErrorCode(error),
      hint: error instanceof CaptureError ? error.hint : undefined,
      stack: verbose ? error.stack : undefined,
    };
  }
  return { error: String(error), name: 'Error', code: 1 };
}

/**
 * Render an error as a log record.
 *
 * Text form is `Name: message`, then `Hint: ...` when the error carries
 * one. JSON form is a single line, so each report stays one record.
 */
export function formatError(error: unknown, options: ErrorFormatOptions = {}): string {
  const output = describeError(error, options.verbose ?? false);

  if (options.json) {
    return JSON.stringify(output);
  }

  const lines = [chalk.red(`${output.name}: `) + output.error];
  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }
  if (output.stack) {
    lines.push(...output.stack.split('\n').map((frame) => chalk.dim(`  ${frame}`)));
  }
  return lines.join('\n');
}

/**
 * The sysexits-style code of a CaptureError; 1 for anything else.
 */
export function getErrorCode(error: unknown): number {
  if (error instanceof CaptureError) {
    return error.code;
  }
  return 1;
}
