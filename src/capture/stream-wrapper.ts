/**
 * Stream Wrapper (user-level interceptor)
 *
 * Hooks `write()` on a Node stream object. Every chunk is forwarded
 * unchanged to the real stream and mirrored into this wrapper's emulator.
 * Output that reaches the file descriptor without going through the
 * stream object (fs.writeSync, native code, child processes) is not seen;
 * use DescriptorRedirect for that.
 *
 * @example
 * ```typescript
 * const lines: Buffer[] = [];
 * const wrapper = new StreamWrapper('stderr', [(line) => lines.push(line)]);
 * wrapper.install();
 * runTrainingLoop();   // progress bars redraw freely
 * wrapper.uninstall(); // lines now holds each bar's final state
 * ```
 */

import type { LineCallback } from '../emulator/types.js';
import { toBytes } from '../utils/bytes.js';
import { Capture } from './capture.js';
import type { StreamName, StreamWrapperOptions, WriteCallback } from './types.js';

export class StreamWrapper extends Capture {
  constructor(
    streamName: StreamName,
    callbacks: Iterable<LineCallback>,
    options: StreamWrapperOptions = {}
  ) {
    super(streamName, callbacks, options, options.emulate ?? true);
  }

  /**
   * Become the active capture for the stream. A superseded wrapper
   * resumes on the row it was writing.
   *
   * @throws UsageError if this wrapper is already active
   */
  install(): void {
    this.stack.push(this);
    this.debug('installed');
  }

  /**
   * Step out of the stream and finalize every buffered row.
   *
   * @throws UsageError if this wrapper is not installed
   */
  uninstall(): void {
    this.stack.remove(this);
    this.sink.flush();
    this.debug('uninstalled');
  }

  /** Superseded: finalize everything above the cursor row. */
  deactivate(): void {
    this.sink.finalizeCompletedRows();
  }

  receive(chunk: string | Uint8Array, encoding?: BufferEncoding, callback?: WriteCallback): boolean {
    const result = this.stack.forward(chunk, encoding, callback);
    this.sink.write(toBytes(chunk, encoding));
    return result;
  }
}
