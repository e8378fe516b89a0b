/**
 * Emulator Module
 *
 * Virtual terminal that turns a raw output stream into finalized lines.
 */

export { TerminalEmulator, renderRow, MAX_COLUMNS } from './terminal-emulator.js';
export { Scrollback, DEFAULT_SCROLLBACK_ROWS } from './scrollback.js';
export type {
  Cell,
  Row,
  CursorPosition,
  LineCallback,
  LineSink,
  ParserState,
  TerminalEmulatorOptions,
} from './types.js';
