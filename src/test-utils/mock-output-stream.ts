/**
 * Mock output stream for capturing what reaches the "terminal".
 */

import type { CaptureStream, WriteCallback } from '../capture/types.js';

export class MockOutputStream implements CaptureStream {
  chunks: string[] = [];

  constructor(readonly fd?: number) {}

  write(
    chunk: string | Uint8Array,
    encodingOrCallback?: BufferEncoding | WriteCallback,
    callback?: WriteCallback
  ): boolean {
    const encoding = typeof encodingOrCallback === 'string' ? encodingOrCallback : 'utf8';
    const done = typeof encodingOrCallback === 'function' ? encodingOrCallback : callback;
    this.chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString(encoding));
    done?.(null);
    return true;
  }

  getOutput(): string {
    return this.chunks.join('');
  }

  clear(): void {
    this.chunks = [];
  }
}
