/**
 * Capture types
 */

import type { LineCallback } from '../emulator/types.js';
import type { ConsoleMode } from '../config/schema.js';
import type { Logger } from '../utils/logger.js';

export type StreamName = 'stdout' | 'stderr';

export type WriteCallback = (error?: Error | null) => void;

/**
 * The slice of a Node writable stream a capture needs. `process.stdout`,
 * `process.stderr` and test doubles all satisfy it.
 */
export interface CaptureStream {
  write(
    chunk: string | Uint8Array,
    encodingOrCallback?: BufferEncoding | WriteCallback,
    callback?: WriteCallback
  ): boolean;
  readonly fd?: number;
}

export type WriteFn = CaptureStream['write'];

/**
 * A member of an InstallationStack. The stack routes every write on its
 * stream to whichever target is on top.
 */
export interface CaptureTarget {
  readonly streamName: StreamName;
  /** Handle one intercepted write; returns the value write() should return */
  receive(chunk: string | Uint8Array, encoding?: BufferEncoding, callback?: WriteCallback): boolean;
  /** Called when the target becomes the top of its stack */
  activate(): void;
  /** Called when the target stops being the top of its stack */
  deactivate(): void;
}

export interface CaptureOptions {
  /** Stream to hook (default: process.stdout / process.stderr) */
  stream?: CaptureStream;
  /** Rows kept revisable before eviction */
  scrollbackRows?: number;
  /** Diagnostic channel for callback and pump failures */
  logger?: Logger;
  /** Log lifecycle transitions through logger.debug */
  debug?: boolean;
  /** TOML file supplying defaults for unset options */
  configPath?: string;
}

export interface StreamWrapperOptions extends CaptureOptions {
  /** Replay through a terminal emulator (default: true) */
  emulate?: boolean;
}

/**
 * Minimal descriptor-level write API; Node's `fs` module satisfies it.
 */
export interface DescriptorIO {
  writeSync(
    fd: number,
    data: string | NodeJS.ArrayBufferView,
    ...rest: Array<number | BufferEncoding | null | undefined>
  ): number;
}

export interface DescriptorRedirectOptions extends CaptureOptions {
  /** Descriptor to tap (default: the stream's fd) */
  fd?: number;
  /** Module whose writeSync is tapped (default: node:fs) */
  io?: DescriptorIO;
  /** Platform used for the support check (default: process.platform) */
  platform?: NodeJS.Platform;
  /** Upper bound on the pipe drain during uninstall */
  drainTimeoutMs?: number;
}

export interface ConsoleCaptureOptions extends StreamWrapperOptions, DescriptorRedirectOptions {
  /** Interception variant (default: configured mode) */
  mode?: ConsoleMode;
}

export type { LineCallback };
