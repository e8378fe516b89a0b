/**
 * Terminal emulator types
 */

/**
 * One written screen position.
 *
 * `style` is the exact escape-sequence text that arrived before `char`
 * and had not been attached to an earlier character.
 */
export interface Cell {
  readonly char: string;
  readonly style: string;
}

/**
 * One on-screen line. `null` marks a blank (erased or never written) cell.
 * Rows have no fixed width and never wrap.
 */
export type Row = Array<Cell | null>;

export interface CursorPosition {
  row: number;
  col: number;
}

/**
 * Receives each finalized line, rendered to bytes.
 */
export type LineCallback = (line: Buffer) => void;

/**
 * Anything a capture can feed intercepted bytes into.
 */
export interface LineSink {
  write(data: string | Uint8Array): void;
  /** Finalize the rows a writer can no longer reach without cursor-up */
  finalizeCompletedRows(): void;
  flush(): void;
}

/**
 * Parser states. Escape sequences and multi-byte characters may be split
 * across `write()` calls, so the state persists between them.
 */
export type ParserState = 'ground' | 'escape' | 'csi' | 'osc';

export interface TerminalEmulatorOptions {
  /** Rows kept revisable before the oldest is finalized (default: 100) */
  scrollbackRows?: number;
  /** Called once per finalized, non-empty line */
  onLine: LineCallback;
}
