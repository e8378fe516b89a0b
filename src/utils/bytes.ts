/**
 * Byte helpers shared by the interceptors.
 */

/**
 * Normalize a `write()` chunk to a private Buffer copy.
 *
 * Writers are free to reuse their buffers after `write()` returns, so
 * anything retained past the call must be copied.
 */
export function toBytes(chunk: string | Uint8Array, encoding?: BufferEncoding): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, encoding ?? 'utf8');
  }
  return Buffer.from(chunk);
}

/**
 * Narrow a chunk read from a byte stream to a Buffer.
 */
export function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw new TypeError(`Unexpected chunk type: ${typeof chunk}`);
}
