/**
 * Default Configuration Values
 *
 * Used when neither a config file nor the environment sets a value.
 * The loader merges user config ON TOP of these defaults.
 */

import { DEFAULT_SCROLLBACK_ROWS } from '../emulator/scrollback.js';
import type { CaptureConfig } from './schema.js';

export const DEFAULT_CONFIG: CaptureConfig = {
  // Enough for multi-bar progress displays, small enough to stay cheap
  scrollback_rows: DEFAULT_SCROLLBACK_ROWS,
  mode: 'wrap',
  drain_timeout_ms: 5000,
  debug: false,
};
