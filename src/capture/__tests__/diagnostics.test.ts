/**
 * Diagnostic Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { createDiagnosticLogger } from '../diagnostics.js';
import { StreamWrapper } from '../stream-wrapper.js';
import { silentLogger } from '../../utils/index.js';
import { MockOutputStream } from '../../test-utils/index.js';

describe('createDiagnosticLogger', () => {
  it('writes warnings as one line', () => {
    const stream = new MockOutputStream();
    const logger = createDiagnosticLogger({ stream });

    logger.warn('pump stalled');

    expect(stream.chunks).toHaveLength(1);
    expect(stream.chunks[0]).toContain('Warning: pump stalled');
    expect(stream.chunks[0]?.endsWith('\n')).toBe(true);
  });

  it('drops debug lines unless enabled', () => {
    const stream = new MockOutputStream();

    createDiagnosticLogger({ stream }).debug?.('hidden');
    createDiagnosticLogger({ stream, debug: true }).debug?.('shown');

    expect(stream.chunks).toHaveLength(1);
    expect(stream.chunks[0]).toContain('[debug] shown');
  });

  it('bypasses a capture installed on its stream', () => {
    const stream = new MockOutputStream();
    const lines: string[] = [];
    const wrapper = new StreamWrapper('stderr', [(line) => lines.push(line.toString())], {
      stream,
      logger: silentLogger,
    });
    const logger = createDiagnosticLogger({ stream });

    wrapper.install();
    logger.warn('callback failed');
    wrapper.uninstall();

    expect(lines).toEqual([]);
    expect(stream.chunks).toHaveLength(1);
  });
});
