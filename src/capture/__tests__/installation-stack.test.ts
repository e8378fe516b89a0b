/**
 * Installation Stack Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InstallationStack } from '../installation-stack.js';
import { UsageError } from '../../errors/index.js';
import { MockOutputStream } from '../../test-utils/index.js';
import type { CaptureTarget, StreamName, WriteCallback } from '../types.js';

class RecordingTarget implements CaptureTarget {
  readonly streamName: StreamName = 'stdout';
  received: string[] = [];
  events: string[] = [];

  constructor(readonly label: string) {}

  receive(chunk: string | Uint8Array, _encoding?: BufferEncoding, callback?: WriteCallback): boolean {
    this.received.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString());
    callback?.(null);
    return true;
  }

  activate(): void {
    this.events.push(`${this.label}:activate`);
  }

  deactivate(): void {
    this.events.push(`${this.label}:deactivate`);
  }
}

describe('InstallationStack', () => {
  let stream: MockOutputStream;
  let stack: InstallationStack;

  beforeEach(() => {
    stream = new MockOutputStream();
    stack = InstallationStack.for(stream);
  });

  it('returns one stack per stream', () => {
    expect(InstallationStack.for(stream)).toBe(stack);
    expect(InstallationStack.for(new MockOutputStream())).not.toBe(stack);
  });

  it('patches write on first push and restores it on last remove', () => {
    const originalWrite = stream.write;
    const target = new RecordingTarget('a');

    stack.push(target);
    expect(stack.isPatched).toBe(true);
    expect(stream.write).not.toBe(originalWrite);

    stack.remove(target);
    expect(stack.isPatched).toBe(false);
    expect(stream.write).toBe(originalWrite);
  });

  it('routes writes to the active target only', () => {
    const a = new RecordingTarget('a');
    const b = new RecordingTarget('b');

    stack.push(a);
    stream.write('one');
    stack.push(b);
    stream.write('two');
    stack.remove(b);
    stream.write('three');
    stack.remove(a);
    stream.write('four');

    expect(a.received).toEqual(['one', 'three']);
    expect(b.received).toEqual(['two']);
    expect(stream.chunks).toEqual(['four']);
  });

  it('normalizes the encoding and callback arguments', () => {
    const target = new RecordingTarget('a');
    let called = 0;
    stack.push(target);

    stream.write('x', () => called++);
    stream.write('y', 'utf8', () => called++);

    expect(target.received).toEqual(['x', 'y']);
    expect(called).toBe(2);
    stack.remove(target);
  });

  it('activates and deactivates in stack order', () => {
    const a = new RecordingTarget('a');
    const b = new RecordingTarget('b');

    stack.push(a);
    stack.push(b);
    stack.remove(b);
    stack.remove(a);

    expect(a.events).toEqual(['a:activate', 'a:deactivate', 'a:activate', 'a:deactivate']);
    expect(b.events).toEqual(['b:activate', 'b:deactivate']);
  });

  it('moves a superseded target back to the top', () => {
    const a = new RecordingTarget('a');
    const b = new RecordingTarget('b');

    stack.push(a);
    stack.push(b);
    stack.push(a);

    expect(stack.size).toBe(2);
    expect(stack.active).toBe(a);

    stack.remove(a);
    expect(stack.active).toBe(b);
    stack.remove(b);
  });

  it('removes a superseded target without touching the active one', () => {
    const a = new RecordingTarget('a');
    const b = new RecordingTarget('b');

    stack.push(a);
    stack.push(b);
    stack.remove(a);

    expect(stack.active).toBe(b);
    expect(a.events).toEqual(['a:activate', 'a:deactivate']);
    expect(b.events).toEqual(['b:activate']);
    stack.remove(b);
  });

  it('rejects pushing the active target again', () => {
    const target = new RecordingTarget('a');
    stack.push(target);

    expect(() => stack.push(target)).toThrow(UsageError);
    expect(() => stack.push(target)).toThrow('RecordingTarget on stdout is already installed');
    expect(stack.size).toBe(1);
    stack.remove(target);
  });

  it('rejects removing a target that is not installed', () => {
    expect(() => stack.remove(new RecordingTarget('a'))).toThrow(
      'RecordingTarget on stdout is not installed'
    );
  });

  describe('forward', () => {
    it('bypasses the active target', () => {
      const target = new RecordingTarget('a');
      stack.push(target);

      stack.forward('direct');

      expect(stream.chunks).toEqual(['direct']);
      expect(target.received).toEqual([]);
      stack.remove(target);
    });
  });

  describe('writeThrough', () => {
    it('writes past installed targets', () => {
      const target = new RecordingTarget('a');
      stack.push(target);

      InstallationStack.writeThrough(stream, 'note\n');

      expect(stream.chunks).toEqual(['note\n']);
      expect(target.received).toEqual([]);
      stack.remove(target);
    });

    it('writes directly to a stream that never had a stack', () => {
      const other = new MockOutputStream();

      InstallationStack.writeThrough(other, 'hello');

      expect(other.chunks).toEqual(['hello']);
    });
  });
});
