/**
 * Console capture factory: picks the interceptor variant for a mode.
 */

import { loadConfig, type ConsoleMode } from '../config/index.js';
import type { LineCallback } from '../emulator/types.js';
import { DescriptorRedirect } from './descriptor-redirect.js';
import { StreamWrapper } from './stream-wrapper.js';
import type { ConsoleCaptureOptions, StreamName } from './types.js';

export type ConsoleCapture = StreamWrapper | DescriptorRedirect;

/**
 * Create (but do not install) a capture for `streamName`.
 *
 * `options.mode` wins over the configured mode:
 * - `wrap`: StreamWrapper with terminal emulation
 * - `wrap_raw`: StreamWrapper passing chunks through untouched
 * - `redirect`: DescriptorRedirect
 *
 * @throws UnsupportedPlatformError for `redirect` where descriptors can't be tapped
 */
export function createConsoleCapture(
  streamName: StreamName,
  callbacks: Iterable<LineCallback>,
  options: ConsoleCaptureOptions = {}
): ConsoleCapture {
  const mode: ConsoleMode = options.mode ?? loadConfig({ path: options.configPath }).mode;

  switch (mode) {
    case 'wrap':
      return new StreamWrapper(streamName, callbacks, { ...options, emulate: true });
    case 'wrap_raw':
      return new StreamWrapper(streamName, callbacks, { ...options, emulate: false });
    case 'redirect':
      return new DescriptorRedirect(streamName, callbacks, options);
  }
}
