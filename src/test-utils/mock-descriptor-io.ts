/**
 * Mock fs-like module recording writeSync output per descriptor.
 *
 * `maxWrite` simulates short writes, `eagainCount` a non-blocking pipe
 * that is momentarily full, `failure` a descriptor that has gone away.
 */

import { bytesOfWriteSync } from '../capture/descriptor-taps.js';
import type { DescriptorIO } from '../capture/types.js';

export class MockDescriptorIO implements DescriptorIO {
  readonly writes = new Map<number, Buffer[]>();
  maxWrite = Infinity;
  eagainCount = 0;
  failure: Error | null = null;
  calls = 0;

  writeSync(
    fd: number,
    data: string | NodeJS.ArrayBufferView,
    ...rest: Array<number | BufferEncoding | null | undefined>
  ): number {
    this.calls++;
    if (this.failure) {
      throw this.failure;
    }
    if (this.eagainCount > 0) {
      this.eagainCount--;
      throw Object.assign(new Error('EAGAIN: resource temporarily unavailable'), { code: 'EAGAIN' });
    }
    const bytes = bytesOfWriteSync(data, rest);
    const written = bytes.subarray(0, Math.min(bytes.length, this.maxWrite));
    const existing = this.writes.get(fd) ?? [];
    existing.push(Buffer.from(written));
    this.writes.set(fd, existing);
    return written.length;
  }

  output(fd: number): string {
    return Buffer.concat(this.writes.get(fd) ?? []).toString('utf8');
  }
}
