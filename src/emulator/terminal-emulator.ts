/**
 * Terminal Emulator
 *
 * Replays a raw output stream against a virtual screen and emits each line
 * once it can no longer change. Progress bars that redraw a row thousands
 * of times with `\r` or cursor movement collapse into their final render,
 * while static output comes out byte for byte.
 *
 * Supported input:
 * - Printable characters (TAB included)
 * - `\r` (column 0) and `\n` (next row, column 0)
 * - CSI sequences `ESC [ params final`:
 *   - `A`/`B`/`C`/`D` cursor up/down/right/left
 *   - `K` erase in line, `J` erase in display
 *   - `m` (SGR) kept verbatim and attached to the next character
 *   - anything else is consumed without effect
 * - OSC sequences and two-byte escapes, dropped
 * - Other control bytes, dropped
 *
 * Colors are never decoded: SGR bytes are replayed exactly as received.
 */

import { StringDecoder } from 'node:string_decoder';
import { DEFAULT_SCROLLBACK_ROWS, Scrollback } from './scrollback.js';
import type {
  CursorPosition,
  LineCallback,
  LineSink,
  ParserState,
  Row,
  TerminalEmulatorOptions,
} from './types.js';

const ESC = '\x1b';
const BEL = '\x07';

/** Longest CSI we buffer before treating the sequence as garbage. */
const MAX_SEQUENCE_LENGTH = 64;

/** Cursor-right never moves past this column; text may still run beyond it. */
export const MAX_COLUMNS = 4096;

/**
 * Render a row to bytes.
 *
 * Each written cell emits its style bytes and then its character. Blank
 * cells before the last written one become spaces; trailing blanks are
 * trimmed.
 */
export function renderRow(row: Row): string {
  const last = row.findLastIndex((cell) => cell !== null);
  let out = '';
  for (let i = 0; i <= last; i++) {
    const cell = row[i];
    out += cell ? cell.style + cell.char : ' ';
  }
  return out;
}

export class TerminalEmulator implements LineSink {
  private readonly decoder = new StringDecoder('utf8');
  private readonly scrollback: Scrollback;
  private readonly onLine: LineCallback;
  private readonly position: CursorPosition = { row: 0, col: 0 };
  private pendingStyle = '';
  private state: ParserState = 'ground';
  private sequence = '';

  constructor(options: TerminalEmulatorOptions) {
    this.scrollback = new Scrollback(options.scrollbackRows ?? DEFAULT_SCROLLBACK_ROWS);
    this.onLine = options.onLine;
  }

  /** Rows currently buffered and still revisable. */
  get bufferedRowCount(): number {
    return this.scrollback.length;
  }

  /** Maximum rows kept before eviction. */
  get capacity(): number {
    return this.scrollback.capacity;
  }

  get cursor(): CursorPosition {
    return { ...this.position };
  }

  /** Style bytes waiting for the next character. */
  get pendingStyleBytes(): string {
    return this.pendingStyle;
  }

  write(data: string | Uint8Array): void {
    const text = typeof data === 'string' ? data : this.decoder.write(data);
    for (const char of text) {
      this.consume(char);
    }
  }

  /**
   * Finalize every buffered row, top to bottom, and start a fresh screen.
   */
  flush(): void {
    const rows = this.scrollback.drain();
    this.position.row = 0;
    this.position.col = 0;
    this.emit(rows);
  }

  /**
   * Finalize every row above the cursor row. The cursor row, the cursor
   * column and the pending style are kept, so writing can resume later.
   */
  finalizeCompletedRows(): void {
    const rows = this.scrollback.takeHead(this.position.row);
    this.position.row -= rows.length;
    this.emit(rows);
  }

  private consume(char: string): void {
    switch (this.state) {
      case 'ground':
        this.consumeGround(char);
        return;
      case 'escape':
        if (char === '[') {
          this.state = 'csi';
          this.sequence += char;
        } else if (char === ']') {
          this.state = 'osc';
          this.sequence = '';
        } else {
          this.state = 'ground';
          this.sequence = '';
        }
        return;
      case 'csi':
        this.consumeCsi(char);
        return;
      case 'osc':
        if (char === BEL) {
          this.state = 'ground';
        } else if (char === ESC) {
          // ST is ESC \, handled by the escape state
          this.state = 'escape';
          this.sequence = ESC;
        }
        return;
    }
  }

  private consumeGround(char: string): void {
    if (char === ESC) {
      this.state = 'escape';
      this.sequence = ESC;
      return;
    }
    if (char === '\r') {
      this.position.col = 0;
      return;
    }
    if (char === '\n') {
      this.lineFeed();
      return;
    }
    const code = char.codePointAt(0) ?? 0;
    if ((code < 0x20 && char !== '\t') || code === 0x7f) {
      return;
    }
    this.put(char);
  }

  private consumeCsi(char: string): void {
    const code = char.codePointAt(0) ?? 0;

    // Parameter (0x30-0x3F) and intermediate (0x20-0x2F) bytes
    if (code >= 0x20 && code <= 0x3f) {
      this.sequence += char;
      if (this.sequence.length > MAX_SEQUENCE_LENGTH) {
        this.state = 'ground';
        this.sequence = '';
      }
      return;
    }

    const raw = this.sequence;
    this.state = 'ground';
    this.sequence = '';

    if (code >= 0x40 && code <= 0x7e) {
      this.dispatchCsi(raw + char, raw.slice(2), char);
      return;
    }

    // Malformed sequence: drop it and treat the byte as fresh input
    this.consumeGround(char);
  }

  private dispatchCsi(raw: string, params: string, final: string): void {
    if (final === 'm') {
      this.pendingStyle += raw;
      return;
    }
    // Private-marker sequences (`ESC [ ? 25 l` and friends) are modes we do not model
    if (/^[<=>?]/.test(params)) {
      return;
    }

    const first = params.split(';')[0] ?? '';
    const value = first === '' ? undefined : Number.parseInt(first, 10);
    const count = value === undefined || Number.isNaN(value) || value < 1 ? 1 : value;
    const mode = value === undefined || Number.isNaN(value) ? 0 : value;

    switch (final) {
      case 'A':
        this.position.row = Math.max(0, this.position.row - count);
        return;
      case 'B':
        this.moveDown(count);
        return;
      case 'C':
        this.position.col = Math.max(
          this.position.col,
          Math.min(this.position.col + count, MAX_COLUMNS)
        );
        return;
      case 'D':
        this.position.col = Math.max(0, this.position.col - count);
        return;
      case 'K':
        this.eraseInLine(mode);
        return;
      case 'J':
        this.eraseInDisplay(mode);
        return;
      default:
        return;
    }
  }

  private put(char: string): void {
    const row = this.scrollback.at(this.position.row);
    while (row.length < this.position.col) {
      row.push(null);
    }
    row[this.position.col] = { char, style: this.pendingStyle };
    this.pendingStyle = '';
    this.position.col += 1;
  }

  private lineFeed(): void {
    if (this.position.row === this.scrollback.lastIndex) {
      this.scrollback.extendTo(this.position.row + 1);
    }
    this.position.row += 1;
    this.position.col = 0;
    this.evict();
  }

  /**
   * Rows below the buffer are materialized on demand so that a later
   * cursor-up can come back to them.
   */
  private moveDown(count: number): void {
    const target = this.position.row + count;
    if (target - this.scrollback.lastIndex >= this.scrollback.capacity) {
      // Every buffered row scrolls out; the rows in between would be blank
      const rows = this.scrollback.drain();
      this.scrollback.extendTo(this.scrollback.capacity - 1);
      this.position.row = this.scrollback.lastIndex;
      this.emit(rows);
      return;
    }
    this.scrollback.extendTo(target);
    this.position.row = target;
    this.evict();
  }

  private eraseInLine(mode: number): void {
    const row = this.scrollback.at(this.position.row);
    switch (mode) {
      case 0:
        if (row.length > this.position.col) {
          row.length = this.position.col;
        }
        return;
      case 1:
        for (let i = 0; i <= this.position.col && i < row.length; i++) {
          row[i] = null;
        }
        return;
      case 2:
        row.length = 0;
        return;
      default:
        return;
    }
  }

  private eraseInDisplay(mode: number): void {
    switch (mode) {
      case 0:
        this.eraseInLine(0);
        this.scrollback.clearRange(this.position.row + 1, this.scrollback.length);
        return;
      case 1:
        this.eraseInLine(1);
        this.scrollback.clearRange(0, this.position.row);
        return;
      case 2:
        this.scrollback.clearRange(0, this.scrollback.length);
        return;
      default:
        return;
    }
  }

  private evict(): void {
    const evicted = this.scrollback.evictOverflow();
    if (evicted.length === 0) {
      return;
    }
    this.position.row -= evicted.length;
    this.emit(evicted);
  }

  /**
   * Runs after all state changes, so a callback that writes back into
   * this emulator sees a consistent screen.
   */
  private emit(rows: Row[]): void {
    for (const row of rows) {
      const line = renderRow(row);
      if (line.length > 0) {
        this.onLine(Buffer.from(line, 'utf8'));
      }
    }
  }
}
