/**
 * Callback Dispatcher
 *
 * Fans each finalized line out to the registered callbacks in
 * registration order. A throwing callback is reported to the logger and
 * skipped; the line still reaches every other callback.
 */

import { CallbackError, formatError } from '../errors/index.js';
import type { LineCallback } from '../emulator/types.js';
import type { Logger } from '../utils/logger.js';

export class CallbackDispatcher {
  private readonly callbacks: readonly LineCallback[];
  private readonly logger: Logger;

  constructor(callbacks: Iterable<LineCallback>, logger: Logger) {
    // Ordered set: a callback registered twice runs once
    this.callbacks = [...new Set(callbacks)];
    this.logger = logger;
  }

  get size(): number {
    return this.callbacks.length;
  }

  dispatch(line: Buffer): void {
    this.callbacks.forEach((callback, index) => {
      try {
        callback(line);
      } catch (error) {
        this.logger.warn(formatError(new CallbackError(index, error)));
      }
    });
  }
}
