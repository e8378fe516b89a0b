/**
 * Pass-through sink for the `wrap_raw` console mode: every intercepted
 * chunk goes to the callbacks as-is, with no terminal emulation.
 */

import type { LineSink } from '../emulator/types.js';
import { toBytes } from '../utils/bytes.js';

export class RawSink implements LineSink {
  constructor(private readonly onChunk: (chunk: Buffer) => void) {}

  write(data: string | Uint8Array): void {
    const bytes = toBytes(data);
    if (bytes.length > 0) {
      this.onChunk(bytes);
    }
  }

  finalizeCompletedRows(): void {}

  flush(): void {}
}
