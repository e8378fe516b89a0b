/**
 * Descriptor Redirect (descriptor-level interceptor)
 *
 * Captures everything bound for a stream's file descriptor: writes through
 * the stream object and direct `fs.writeSync(fd, ...)` calls alike. Both
 * paths feed a private pipe; a pump drains the pipe on each `readable`
 * event, writes each chunk unchanged to the original descriptor and
 * mirrors it into the emulator. Being superseded drains the pipe at once.
 *
 * ```
 * stream.write ─┐
 *               ├─► pipe ─► pump ─┬─► original descriptor
 * fs.writeSync ─┘                 └─► emulator ─► callbacks
 * ```
 *
 * Uninstall is drain-then-restore: the pipe is closed, the pump finishes
 * every queued chunk, writes that raced the close are delivered in order,
 * and only then is the descriptor handed back.
 */

import fs from 'node:fs';
import { PassThrough } from 'node:stream';
import type { LineCallback } from '../emulator/types.js';
import { PumpError, UnsupportedPlatformError, UsageError, formatError } from '../errors/index.js';
import { toBuffer, toBytes } from '../utils/bytes.js';
import { Capture } from './capture.js';
import { DescriptorTaps } from './descriptor-taps.js';
import type {
  DescriptorIO,
  DescriptorRedirectOptions,
  StreamName,
  WriteCallback,
} from './types.js';

const nodeIO: DescriptorIO = fs;

/** Platforms without the descriptor primitives this variant relies on. */
const UNSUPPORTED_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set(['win32']);

/**
 * Resolve once `promise` settles or `ms` elapses.
 *
 * @returns false on timeout
 */
async function settleWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class DescriptorRedirect extends Capture {
  readonly fd: number;
  private readonly taps: DescriptorTaps;
  private readonly tap = (bytes: Buffer): void => this.capture(bytes);
  private pipe: PassThrough | null = null;
  private pump: Promise<void> | null = null;
  /** Chunks written after the stop signal, while the pump drains */
  private tail: Buffer[] | null = null;
  private failure: PumpError | null = null;

  /**
   * @throws UnsupportedPlatformError on platforms or streams without a usable descriptor
   */
  constructor(
    streamName: StreamName,
    callbacks: Iterable<LineCallback>,
    options: DescriptorRedirectOptions = {}
  ) {
    super(streamName, callbacks, options, true, { drain_timeout_ms: options.drainTimeoutMs });

    const platform = options.platform ?? process.platform;
    if (UNSUPPORTED_PLATFORMS.has(platform)) {
      throw new UnsupportedPlatformError('Descriptor redirect', platform);
    }

    const fd = options.fd ?? this.stream.fd;
    if (typeof fd !== 'number') {
      throw new UnsupportedPlatformError(`Descriptor redirect of ${streamName}`, 'a stream without a file descriptor');
    }

    this.fd = fd;
    this.taps = DescriptorTaps.for(options.io ?? nodeIO);
  }

  /** Whether the pump died and restored the descriptor on its own. */
  get hasFailed(): boolean {
    return this.failure !== null;
  }

  /**
   * Start the pump (first install only) and become the active capture.
   *
   * @throws UsageError if this redirect is already active or still draining
   */
  install(): void {
    if (this.tail !== null) {
      throw new UsageError(`DescriptorRedirect on ${this.streamName} is still uninstalling`);
    }
    this.stack.push(this);
    if (this.pipe === null) {
      this.failure = null;
      this.startPump();
    }
    this.debug(`installed on fd ${this.fd}`);
  }

  /**
   * Stop the pump, drain it, restore the descriptor and finalize every
   * buffered row.
   *
   * @throws UsageError if this redirect is not installed or already uninstalling
   */
  async uninstall(): Promise<void> {
    if (this.failure !== null) {
      // The pump already restored the descriptor
      this.failure = null;
      this.sink.flush();
      return;
    }
    if (!this.stack.has(this) || this.tail !== null) {
      throw new UsageError(`DescriptorRedirect on ${this.streamName} is not installed`);
    }

    this.tail = [];
    const pipe = this.pipe;
    const pump = this.pump;
    pipe?.end();

    try {
      if (pump && !(await settleWithin(pump, this.settings.drain_timeout_ms))) {
        this.logger.warn(
          `Output pump for ${this.streamName} did not drain within ${this.settings.drain_timeout_ms}ms`
        );
        pipe?.destroy();
      }
    } finally {
      const tail = this.tail ?? [];
      this.tail = null;
      if (this.stack.has(this)) {
        for (const bytes of tail) {
          this.deliver(bytes);
        }
        this.stack.remove(this);
      }
      this.pipe = null;
      this.pump = null;
      this.failure = null;
      this.sink.flush();
      this.debug('uninstalled');
    }
  }

  receive(chunk: string | Uint8Array, encoding?: BufferEncoding, callback?: WriteCallback): boolean {
    this.capture(toBytes(chunk, encoding));
    if (callback) {
      process.nextTick(callback);
    }
    return true;
  }

  activate(): void {
    this.taps.attach(this.fd, this.tap);
  }

  /**
   * Superseded or removed: deliver what the pump has not reached yet,
   * then finalize everything above the cursor row.
   */
  deactivate(): void {
    this.taps.detach(this.fd, this.tap);
    if (this.pipe && !this.pipe.destroyed) {
      this.drainPipe(this.pipe);
    }
    this.sink.finalizeCompletedRows();
  }

  private capture(bytes: Buffer): void {
    if (this.tail !== null) {
      this.tail.push(bytes);
      return;
    }
    this.pipe?.write(bytes);
  }

  private deliver(bytes: Buffer): void {
    this.taps.writeOriginal(this.fd, bytes);
    this.sink.write(bytes);
  }

  private startPump(): void {
    const pipe = new PassThrough();
    this.pipe = pipe;
    this.pump = new Promise<void>((resolve) => {
      pipe.on('readable', () => this.drainPipe(pipe));
      pipe.once('error', (error) => this.failSafe(pipe, error));
      pipe.once('end', () => resolve());
      pipe.once('close', () => resolve());
    });
  }

  /**
   * Deliver every chunk buffered in `pipe`. Reading and delivering happen
   * in one synchronous pass, so no chunk is ever held between the two.
   */
  private drainPipe(pipe: PassThrough): void {
    try {
      for (let chunk: unknown = pipe.read(); chunk !== null; chunk = pipe.read()) {
        this.deliver(toBuffer(chunk));
      }
    } catch (error) {
      this.failSafe(pipe, error);
    }
  }

  /**
   * Restore the descriptor first, then report.
   */
  private failSafe(pipe: PassThrough, cause: unknown): void {
    // A pipe retired by a timed-out uninstall has already been reported
    if (this.pipe !== pipe) {
      return;
    }
    pipe.destroy();
    this.pipe = null;
    this.pump = null;
    if (this.stack.has(this)) {
      this.stack.remove(this);
    }
    // The original descriptor is what failed; keep queued output for the callbacks
    const queued = this.tail ?? [];
    this.tail = null;
    for (const bytes of queued) {
      this.sink.write(bytes);
    }
    this.failure = new PumpError(this.streamName, cause);
    this.logger.warn(formatError(this.failure));
  }
}
