/**
 * Default diagnostic logger for captures.
 *
 * Writes straight to the real stderr through its InstallationStack, so a
 * report about a capture on stderr never lands in that capture's emulator.
 */

import chalk from 'chalk';
import type { Logger } from '../utils/logger.js';
import { InstallationStack } from './installation-stack.js';
import type { CaptureStream } from './types.js';

export interface DiagnosticLoggerOptions {
  /** Emit debug lines (default: false) */
  debug?: boolean;
  /** Destination (default: process.stderr) */
  stream?: CaptureStream;
}

export function createDiagnosticLogger(options: DiagnosticLoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const debug = options.debug ?? false;

  return {
    warn: (message: string) => {
      InstallationStack.writeThrough(stream, `${chalk.yellow(`Warning: ${message}`)}\n`);
    },
    debug: (message: string) => {
      if (debug) {
        InstallationStack.writeThrough(stream, `${chalk.dim(`[debug] ${message}`)}\n`);
      }
    },
  };
}
