/**
 * Shared plumbing for both interceptor variants: settings resolution,
 * the emulator (or raw sink), the dispatcher and stack membership.
 */

import { resolveCaptureSettings, type CaptureConfig, type PartialCaptureConfig } from '../config/index.js';
import { TerminalEmulator } from '../emulator/terminal-emulator.js';
import type { LineCallback, LineSink } from '../emulator/types.js';
import { ValidationError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { createDiagnosticLogger } from './diagnostics.js';
import { CallbackDispatcher } from './dispatcher.js';
import { InstallationStack } from './installation-stack.js';
import { RawSink } from './raw-sink.js';
import type {
  CaptureOptions,
  CaptureStream,
  CaptureTarget,
  StreamName,
  WriteCallback,
} from './types.js';

/**
 * The process stream behind a stream name.
 */
export function resolveStream(streamName: StreamName): CaptureStream {
  switch (streamName) {
    case 'stdout':
      return process.stdout;
    case 'stderr':
      return process.stderr;
    default:
      throw new ValidationError(`Unknown stream: ${String(streamName)}`, [
        "streamName must be 'stdout' or 'stderr'",
      ]);
  }
}

export abstract class Capture implements CaptureTarget {
  readonly streamName: StreamName;
  protected readonly stream: CaptureStream;
  protected readonly stack: InstallationStack;
  protected readonly settings: CaptureConfig;
  protected readonly logger: Logger;
  protected readonly sink: LineSink;
  private readonly terminal: TerminalEmulator | null;

  protected constructor(
    streamName: StreamName,
    callbacks: Iterable<LineCallback>,
    options: CaptureOptions,
    emulate: boolean,
    overrides: PartialCaptureConfig = {}
  ) {
    this.streamName = streamName;
    this.stream = options.stream ?? resolveStream(streamName);
    this.settings = resolveCaptureSettings(
      { scrollback_rows: options.scrollbackRows, debug: options.debug, ...overrides },
      { path: options.configPath }
    );
    this.logger = options.logger ?? createDiagnosticLogger({ debug: this.settings.debug });
    this.stack = InstallationStack.for(this.stream);

    const dispatcher = new CallbackDispatcher(callbacks, this.logger);
    const onLine = (line: Buffer) => dispatcher.dispatch(line);
    this.terminal = emulate
      ? new TerminalEmulator({ scrollbackRows: this.settings.scrollback_rows, onLine })
      : null;
    this.sink = this.terminal ?? new RawSink(onLine);
  }

  /** The capture's virtual terminal; null in raw mode. */
  get emulator(): TerminalEmulator | null {
    return this.terminal;
  }

  /** Rows buffered in the emulator (0 in raw mode). */
  get bufferedRowCount(): number {
    return this.terminal?.bufferedRowCount ?? 0;
  }

  get isInstalled(): boolean {
    return this.stack.has(this);
  }

  get isActive(): boolean {
    return this.stack.active === this;
  }

  abstract install(): void;
  abstract uninstall(): void | Promise<void>;
  abstract receive(
    chunk: string | Uint8Array,
    encoding?: BufferEncoding,
    callback?: WriteCallback
  ): boolean;

  activate(): void {}

  deactivate(): void {}

  protected debug(message: string): void {
    if (!this.settings.debug) {
      return;
    }
    this.logger.debug?.(`${this.constructor.name}(${this.streamName}): ${message}`);
  }
}
