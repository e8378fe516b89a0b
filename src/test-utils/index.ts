/**
 * Test Utilities Module
 *
 * In-process stand-ins for the streams and descriptors a capture hooks.
 *
 * @example
 * ```typescript
 * import { MockOutputStream } from '../../test-utils/index.js';
 *
 * const stream = new MockOutputStream();
 * const capture = new StreamWrapper('stdout', [onLine], { stream, logger: silentLogger });
 * ```
 */

export { MockOutputStream } from './mock-output-stream.js';
export { MockDescriptorIO } from './mock-descriptor-io.js';
