/**
 * Installation Stack
 *
 * One stack per stream object tracks every installed capture in install
 * order. The topmost capture is the active one: the stack replaces the
 * stream's `write` once, routes each call to the active capture, and puts
 * the original back when the last capture leaves.
 *
 * Layout for `process.stdout` with two captures installed:
 * ```
 * process.stdout.write ──► stack.route() ──► B.receive()   (active, top)
 *                                            A             (superseded)
 * stack.forward() ──► original write ──► terminal
 * ```
 *
 * A superseded capture finalizes the rows above its cursor; reinstalling
 * it moves it back to the top with its cursor row intact.
 */

import { UsageError } from '../errors/index.js';
import type {
  CaptureStream,
  CaptureTarget,
  WriteCallback,
  WriteFn,
} from './types.js';

const stacks = new WeakMap<CaptureStream, InstallationStack>();

function describe(target: CaptureTarget): string {
  return `${target.constructor.name} on ${target.streamName}`;
}

export class InstallationStack {
  private readonly entries: CaptureTarget[] = [];
  private original: WriteFn | null = null;

  private constructor(private readonly stream: CaptureStream) {}

  /**
   * The stack for `stream`, created on first use.
   */
  static for(stream: CaptureStream): InstallationStack {
    let stack = stacks.get(stream);
    if (!stack) {
      stack = new InstallationStack(stream);
      stacks.set(stream, stack);
    }
    return stack;
  }

  /**
   * Write to `stream` past every capture installed on it.
   */
  static writeThrough(stream: CaptureStream, text: string): void {
    const stack = stacks.get(stream);
    if (stack) {
      stack.forward(text);
    } else {
      stream.write(text);
    }
  }

  get active(): CaptureTarget | undefined {
    return this.entries[this.entries.length - 1];
  }

  get size(): number {
    return this.entries.length;
  }

  /** Whether the stream's write() is currently replaced. */
  get isPatched(): boolean {
    return this.original !== null;
  }

  has(target: CaptureTarget): boolean {
    return this.entries.includes(target);
  }

  /**
   * Make `target` the active capture. The previous one is deactivated
   * after `target` is on top, so output it produces while settling is
   * routed to `target`.
   *
   * @throws UsageError if `target` is already active
   */
  push(target: CaptureTarget): void {
    const previous = this.active;
    if (previous === target) {
      throw new UsageError(`${describe(target)} is already installed`);
    }

    const index = this.entries.indexOf(target);
    if (index !== -1) {
      this.entries.splice(index, 1);
    }

    this.entries.push(target);
    this.patch();
    previous?.deactivate();
    target.activate();
  }

  /**
   * Take `target` out of the stack. If it was active, the capture below it
   * becomes active again; if it was the last one, the original write()
   * is restored.
   *
   * @throws UsageError if `target` is not installed
   */
  remove(target: CaptureTarget): void {
    const index = this.entries.indexOf(target);
    if (index === -1) {
      throw new UsageError(`${describe(target)} is not installed`);
    }

    const wasActive = index === this.entries.length - 1;
    this.entries.splice(index, 1);
    if (wasActive) {
      target.deactivate();
    }

    if (this.entries.length === 0) {
      this.unpatch();
    } else if (wasActive) {
      this.active?.activate();
    }
  }

  /**
   * Send a chunk to the real destination, bypassing every capture.
   */
  forward(
    chunk: string | Uint8Array,
    encoding?: BufferEncoding,
    callback?: WriteCallback
  ): boolean {
    const write = this.original ?? this.stream.write;
    if (encoding === undefined) {
      return write.call(this.stream, chunk, callback);
    }
    return write.call(this.stream, chunk, encoding, callback);
  }

  private route(
    chunk: string | Uint8Array,
    encodingOrCallback?: BufferEncoding | WriteCallback,
    callback?: WriteCallback
  ): boolean {
    const encoding = typeof encodingOrCallback === 'string' ? encodingOrCallback : undefined;
    const done = typeof encodingOrCallback === 'function' ? encodingOrCallback : callback;

    const active = this.active;
    if (!active) {
      return this.forward(chunk, encoding, done);
    }
    return active.receive(chunk, encoding, done);
  }

  private patch(): void {
    if (this.original) {
      return;
    }
    this.original = this.stream.write;
    this.stream.write = (chunk, encodingOrCallback, callback) =>
      this.route(chunk, encodingOrCallback, callback);
  }

  private unpatch(): void {
    if (!this.original) {
      return;
    }
    this.stream.write = this.original;
    this.original = null;
  }
}
