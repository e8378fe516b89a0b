/**
 * Scrollback Buffer
 *
 * Holds the rows that can still be revised by cursor movement. Once the
 * buffer grows past its capacity, the oldest rows are evicted FIFO and
 * handed back to the caller for finalization, which bounds memory to
 * O(capacity) no matter how much output passes through.
 */

import type { Row } from './types.js';

export const DEFAULT_SCROLLBACK_ROWS = 100;

export class Scrollback {
  private rows: Row[] = [[]];

  constructor(readonly capacity: number = DEFAULT_SCROLLBACK_ROWS) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Scrollback capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.rows.length;
  }

  get lastIndex(): number {
    return this.rows.length - 1;
  }

  /**
   * Row at `index`. Callers keep `index` inside `[0, length)`.
   */
  at(index: number): Row {
    const row = this.rows[index];
    if (row === undefined) {
      throw new RangeError(`Row ${index} is outside the scrollback (${this.rows.length} rows)`);
    }
    return row;
  }

  /**
   * Append empty rows until `index` is addressable.
   */
  extendTo(index: number): void {
    while (this.rows.length <= index) {
      this.rows.push([]);
    }
  }

  /**
   * Remove rows from the top until at most `capacity` remain.
   *
   * @returns The evicted rows, oldest first
   */
  evictOverflow(): Row[] {
    const overflow = this.rows.length - this.capacity;
    if (overflow <= 0) {
      return [];
    }
    return this.rows.splice(0, overflow);
  }

  /**
   * Remove the first `count` rows; at least one row always remains.
   *
   * @returns The removed rows, top to bottom
   */
  takeHead(count: number): Row[] {
    return this.rows.splice(0, Math.min(Math.max(0, count), this.rows.length - 1));
  }

  /**
   * Remove every row and start over with a single empty one.
   *
   * @returns The removed rows, top to bottom
   */
  drain(): Row[] {
    const drained = this.rows;
    this.rows = [[]];
    return drained;
  }

  /**
   * Blank every row in `[start, end)`.
   */
  clearRange(start: number, end: number): void {
    for (let i = Math.max(0, start); i < Math.min(end, this.rows.length); i++) {
      this.at(i).length = 0;
    }
  }
}
