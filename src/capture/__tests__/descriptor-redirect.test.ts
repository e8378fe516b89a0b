/**
 * Descriptor Redirect Tests
 *
 * Uses MockDescriptorIO in place of node:fs, so no real descriptor is
 * touched.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DescriptorRedirect } from '../descriptor-redirect.js';
import { StreamWrapper } from '../stream-wrapper.js';
import { UnsupportedPlatformError, UsageError } from '../../errors/index.js';
import { silentLogger, type Logger } from '../../utils/index.js';
import { MockDescriptorIO, MockOutputStream } from '../../test-utils/index.js';

describe('DescriptorRedirect', () => {
  let io: MockDescriptorIO;
  let stream: MockOutputStream;
  let lines: string[];

  function createRedirect(logger: Logger = silentLogger, debug = false): DescriptorRedirect {
    return new DescriptorRedirect('stdout', [(line) => lines.push(line.toString('utf8'))], {
      stream,
      io,
      platform: 'linux',
      logger,
      debug,
    });
  }

  beforeEach(() => {
    io = new MockDescriptorIO();
    stream = new MockOutputStream(1);
    lines = [];
  });

  it('captures direct descriptor writes and stream writes', async () => {
    const redirect = createRedirect();

    redirect.install();
    io.writeSync(1, 'from fd\n');
    stream.write('from stream\n');
    await redirect.uninstall();

    expect(lines).toEqual(['from fd', 'from stream']);
    expect(io.output(1)).toBe('from fd\nfrom stream\n');
    expect(stream.chunks).toEqual([]);
  });

  it('finalizes a superseded redirect when the one above it leaves', async () => {
    const firstLines: string[] = [];
    const secondLines: string[] = [];
    const first = new DescriptorRedirect('stdout', [(line) => firstLines.push(line.toString())], {
      stream,
      io,
      platform: 'linux',
      logger: silentLogger,
    });
    const second = new DescriptorRedirect('stdout', [(line) => secondLines.push(line.toString())], {
      stream,
      io,
      platform: 'linux',
      logger: silentLogger,
    });

    first.install();
    io.writeSync(1, 'ABCD\n');
    second.install();
    io.writeSync(1, 'WXYZ\n');
    first.install();
    io.writeSync(1, '1234\n');
    second.install();
    io.writeSync(1, '5678\n');
    await second.uninstall();

    expect(firstLines).toEqual(['ABCD', '1234']);
    expect(secondLines).toEqual(['WXYZ', '5678']);
    expect(io.output(1)).toBe('ABCD\nWXYZ\n1234\n5678\n');

    await first.uninstall();
    expect(firstLines).toEqual(['ABCD', '1234']);
  });

  it('keeps style bytes and drops stray control characters', async () => {
    const redirect = createRedirect();

    redirect.install();
    io.writeSync(1, '\x1b[31m\x1b[40m\x1b[1mHello\x01\x1b[22m\x1b[39m');
    await redirect.uninstall();

    expect(lines).toEqual(['\x1b[31m\x1b[40m\x1b[1mHello']);
  });

  it('rewrites four rows with mixed movement and erasure', async () => {
    const redirect = createRedirect();

    redirect.install();
    io.writeSync(1, 'ABCD\nEFGH\nIJKX\nMNOP');
    io.writeSync(1, '\x1b[1A\x1b[1DL\x1b[1B\r\x1b[KQRSD\x1b[1D\x1b[1C\x1b[1DT');
    io.writeSync(1, '\x1b[4A\x1b[1K\r1234\x1b[4B\rWXYZ\x1b[2K\n');
    await redirect.uninstall();

    expect(lines).toEqual(['1234', 'EFGH', 'IJKL', 'QRST']);
  });

  it('yields nothing after erasing the screen', async () => {
    const redirect = createRedirect();

    redirect.install();
    io.writeSync(1, 'QWERT\nYUIOP\n12345\n');
    io.writeSync(1, '\x1b[2J\n');
    await redirect.uninstall();

    expect(lines).toEqual([]);
  });

  it('leaves other descriptors alone', async () => {
    const redirect = createRedirect();

    redirect.install();
    io.writeSync(2, 'elsewhere\n');
    await redirect.uninstall();

    expect(lines).toEqual([]);
    expect(io.output(2)).toBe('elsewhere\n');
  });

  it('collapses redraws written straight to the descriptor', async () => {
    const redirect = createRedirect();

    redirect.install();
    for (let i = 1; i <= 5; i++) {
      io.writeSync(1, `\rstep ${i}/5`);
    }
    io.writeSync(1, '\n');
    await redirect.uninstall();

    expect(lines).toEqual(['step 5/5']);
  });

  it('delivers writes that race the drain, in order', async () => {
    const redirect = createRedirect();

    redirect.install();
    io.writeSync(1, 'early\n');
    const uninstalled = redirect.uninstall();
    io.writeSync(1, 'late\n');
    await uninstalled;

    expect(io.output(1)).toBe('early\nlate\n');
    expect(lines).toEqual(['early', 'late']);
  });

  it('restores writeSync once drained', async () => {
    const originalWriteSync = io.writeSync;
    const redirect = createRedirect();

    redirect.install();
    expect(io.writeSync).not.toBe(originalWriteSync);
    await redirect.uninstall();

    expect(io.writeSync).toBe(originalWriteSync);
    expect(redirect.isInstalled).toBe(false);
  });

  it('acknowledges stream write callbacks', async () => {
    const redirect = createRedirect();
    const callback = vi.fn();

    redirect.install();
    stream.write('x', callback);
    await redirect.uninstall();

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('hands the descriptor to a wrapper installed on top and takes it back', async () => {
    const redirect = createRedirect();
    const wrapperLines: string[] = [];
    const wrapper = new StreamWrapper('stdout', [(line) => wrapperLines.push(line.toString())], {
      stream,
      logger: silentLogger,
    });

    redirect.install();
    io.writeSync(1, 'a\n');
    wrapper.install();
    stream.write('b\n');
    wrapper.uninstall();
    io.writeSync(1, 'c\n');
    await redirect.uninstall();

    expect(lines).toEqual(['a', 'c']);
    expect(wrapperLines).toEqual(['b']);
    expect(stream.chunks).toEqual(['b\n']);
    expect(io.output(1)).toBe('a\nc\n');
  });

  it('can be installed again after uninstalling', async () => {
    const redirect = createRedirect();

    redirect.install();
    io.writeSync(1, 'one\n');
    await redirect.uninstall();
    redirect.install();
    io.writeSync(1, 'two\n');
    await redirect.uninstall();

    expect(lines).toEqual(['one', 'two']);
  });

  it('logs lifecycle transitions when debug is on', async () => {
    const debug = vi.fn();
    const redirect = createRedirect({ warn: vi.fn(), debug }, true);

    redirect.install();
    await redirect.uninstall();

    expect(debug.mock.calls).toEqual([
      ['DescriptorRedirect(stdout): installed on fd 1'],
      ['DescriptorRedirect(stdout): uninstalled'],
    ]);
  });

  it('stays quiet when debug is off', async () => {
    const debug = vi.fn();
    const redirect = createRedirect({ warn: vi.fn(), debug });

    redirect.install();
    await redirect.uninstall();

    expect(debug).not.toHaveBeenCalled();
  });

  describe('platform support', () => {
    it('refuses win32', () => {
      expect(
        () => new DescriptorRedirect('stdout', [], { stream, io, platform: 'win32', logger: silentLogger })
      ).toThrow(UnsupportedPlatformError);
    });

    it('refuses a stream without a descriptor', () => {
      expect(
        () =>
          new DescriptorRedirect('stdout', [], {
            stream: new MockOutputStream(),
            io,
            platform: 'linux',
            logger: silentLogger,
          })
      ).toThrow('Descriptor redirect of stdout is not supported on a stream without a file descriptor');
    });

    it('accepts an explicit descriptor', () => {
      const redirect = new DescriptorRedirect('stdout', [], {
        stream: new MockOutputStream(),
        fd: 7,
        io,
        platform: 'linux',
        logger: silentLogger,
      });

      expect(redirect.fd).toBe(7);
    });
  });

  describe('usage errors', () => {
    it('rejects uninstall without install', async () => {
      const redirect = createRedirect();

      await expect(redirect.uninstall()).rejects.toThrow(UsageError);
    });

    it('rejects a second uninstall', async () => {
      const redirect = createRedirect();

      redirect.install();
      await redirect.uninstall();

      await expect(redirect.uninstall()).rejects.toThrow(
        'DescriptorRedirect on stdout is not installed'
      );
    });

    it('rejects install and uninstall while draining', async () => {
      const redirect = createRedirect();

      redirect.install();
      const uninstalled = redirect.uninstall();

      expect(() => redirect.install()).toThrow('DescriptorRedirect on stdout is still uninstalling');
      await expect(redirect.uninstall()).rejects.toThrow(UsageError);
      await uninstalled;
      expect(redirect.isInstalled).toBe(false);
    });
  });

  describe('pump failure', () => {
    it('restores the descriptor and reports a PumpError', async () => {
      const warn = vi.fn();
      const originalWriteSync = io.writeSync;
      const redirect = createRedirect({ warn });

      redirect.install();
      io.failure = new Error('EBADF: bad file descriptor');
      io.writeSync(1, 'lost\n');

      await vi.waitFor(() => expect(redirect.hasFailed).toBe(true));

      expect(redirect.isInstalled).toBe(false);
      expect(io.writeSync).toBe(originalWriteSync);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0]?.[0]).toContain('PumpError: ');
      expect(warn.mock.calls[0]?.[0]).toContain(
        'Output pump for stdout stopped: EBADF: bad file descriptor'
      );
    });

    it('only flushes on the uninstall that follows', async () => {
      const redirect = createRedirect({ warn: vi.fn() });

      redirect.install();
      io.failure = new Error('EBADF: bad file descriptor');
      io.writeSync(1, 'lost\n');
      await vi.waitFor(() => expect(redirect.hasFailed).toBe(true));

      await redirect.uninstall();

      expect(redirect.hasFailed).toBe(false);
      await expect(redirect.uninstall()).rejects.toThrow(UsageError);
    });
  });
});
