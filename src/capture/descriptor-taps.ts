/**
 * Descriptor Taps
 *
 * Per-descriptor hooks on an fs-like module's `writeSync`. The module is
 * patched once, when its first tap attaches; writes to a tapped descriptor
 * go to that tap's sink, every other descriptor falls through to the real
 * `writeSync`. The original comes back when the last tap detaches.
 *
 * Patching Node's own `fs` also resyncs the named ESM exports, so
 * `import { writeSync } from 'node:fs'` in other modules sees the tap.
 */

import fs from 'node:fs';
import { syncBuiltinESMExports } from 'node:module';
import type { DescriptorIO } from './types.js';

export type DescriptorSink = (bytes: Buffer) => void;

type WriteSyncFn = DescriptorIO['writeSync'];

const registries = new WeakMap<DescriptorIO, DescriptorTaps>();

/** Consecutive EAGAINs tolerated before a write gives up. */
export const MAX_EAGAIN_RETRIES = 50;

/** Longest pause between EAGAIN retries. */
const MAX_BACKOFF_MS = 10;

const backoffCell = new Int32Array(new SharedArrayBuffer(4));

function sleepSync(ms: number): void {
  Atomics.wait(backoffCell, 0, 0, ms);
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Copy out the bytes a writeSync call would write, for either overload:
 * `(fd, buffer, offset?, length?, position?)` or `(fd, string, position?, encoding?)`.
 */
export function bytesOfWriteSync(
  data: string | NodeJS.ArrayBufferView,
  rest: ReadonlyArray<number | BufferEncoding | null | undefined>
): Buffer {
  if (typeof data === 'string') {
    const encoding = rest[1];
    return Buffer.from(data, typeof encoding === 'string' ? encoding : 'utf8');
  }
  const offset = typeof rest[0] === 'number' ? rest[0] : 0;
  const length = typeof rest[1] === 'number' ? rest[1] : data.byteLength - offset;
  return Buffer.from(new Uint8Array(data.buffer, data.byteOffset + offset, length));
}

export class DescriptorTaps {
  private readonly sinks = new Map<number, DescriptorSink>();
  private original: WriteSyncFn | null = null;

  private constructor(private readonly io: DescriptorIO) {}

  static for(io: DescriptorIO): DescriptorTaps {
    let taps = registries.get(io);
    if (!taps) {
      taps = new DescriptorTaps(io);
      registries.set(io, taps);
    }
    return taps;
  }

  get tappedDescriptors(): number[] {
    return [...this.sinks.keys()];
  }

  attach(fd: number, sink: DescriptorSink): void {
    this.sinks.set(fd, sink);
    this.patch();
  }

  detach(fd: number, sink: DescriptorSink): void {
    if (this.sinks.get(fd) === sink) {
      this.sinks.delete(fd);
    }
    if (this.sinks.size === 0) {
      this.unpatch();
    }
  }

  /**
   * Write all of `bytes` to the real descriptor, retrying short writes.
   * EAGAIN from a full non-blocking pipe is retried with a growing pause,
   * up to MAX_EAGAIN_RETRIES times in a row.
   */
  writeOriginal(fd: number, bytes: Buffer): void {
    const writeSync = this.original ?? this.io.writeSync;
    let written = 0;
    let attempts = 0;
    while (written < bytes.length) {
      try {
        written += writeSync.call(this.io, fd, bytes, written, bytes.length - written);
        attempts = 0;
      } catch (error) {
        if (!isErrno(error, 'EAGAIN') || attempts >= MAX_EAGAIN_RETRIES) {
          throw error;
        }
        attempts++;
        sleepSync(Math.min(attempts, MAX_BACKOFF_MS));
      }
    }
  }

  private patch(): void {
    if (this.original) {
      return;
    }
    const original = this.io.writeSync;
    this.original = original;
    this.io.writeSync = (fd, data, ...rest) => {
      const sink = this.sinks.get(fd);
      if (!sink) {
        return original.call(this.io, fd, data, ...rest);
      }
      const bytes = bytesOfWriteSync(data, rest);
      sink(bytes);
      return bytes.length;
    };
    this.resync();
  }

  private unpatch(): void {
    if (!this.original) {
      return;
    }
    this.io.writeSync = this.original;
    this.original = null;
    this.resync();
  }

  private resync(): void {
    if (this.io === fs) {
      syncBuiltinESMExports();
    }
  }
}
