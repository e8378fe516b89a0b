/**
 * Callback Dispatcher Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { CallbackDispatcher } from '../dispatcher.js';
import { silentLogger } from '../../utils/index.js';
import type { LineCallback } from '../types.js';

describe('CallbackDispatcher', () => {
  it('calls every callback in registration order', () => {
    const order: string[] = [];
    const dispatcher = new CallbackDispatcher(
      [(line) => order.push(`a:${line.toString()}`), (line) => order.push(`b:${line.toString()}`)],
      silentLogger
    );

    dispatcher.dispatch(Buffer.from('x'));
    dispatcher.dispatch(Buffer.from('y'));

    expect(order).toEqual(['a:x', 'b:x', 'a:y', 'b:y']);
  });

  it('runs a callback registered twice only once', () => {
    const callback = vi.fn<LineCallback>();
    const dispatcher = new CallbackDispatcher([callback, callback], silentLogger);

    dispatcher.dispatch(Buffer.from('line'));

    expect(dispatcher.size).toBe(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('reports a failing callback and keeps delivering', () => {
    const warn = vi.fn();
    const after = vi.fn<LineCallback>();
    const dispatcher = new CallbackDispatcher(
      [
        () => {
          throw new Error('boom');
        },
        after,
      ],
      { warn }
    );

    dispatcher.dispatch(Buffer.from('line'));

    expect(after).toHaveBeenCalledWith(Buffer.from('line'));
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toContain('CallbackError: ');
    expect(warn.mock.calls[0]?.[0]).toContain('Line callback #0 failed: boom');
  });

  it('reports non-Error throws', () => {
    const warn = vi.fn();
    const dispatcher = new CallbackDispatcher(
      [
        () => undefined,
        () => {
          throw 'plain string';
        },
      ],
      { warn }
    );

    dispatcher.dispatch(Buffer.from('line'));

    expect(warn.mock.calls[0]?.[0]).toContain('Line callback #1 failed: plain string');
  });
});
