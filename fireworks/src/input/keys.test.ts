import { PassThrough } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import { KeyListener, decodeKeys } from './keys.js';

describe('decodeKeys', () => {
  it('maps space to skip and q, Ctrl+C or a lone ESC to quit', () => {
    expect(decodeKeys(' ')).toEqual(['skip']);
    expect(decodeKeys('q')).toEqual(['quit']);
    expect(decodeKeys('Q')).toEqual(['quit']);
    expect(decodeKeys('\x03')).toEqual(['quit']);
    expect(decodeKeys('\x1b')).toEqual(['quit']);
  });

  it('ignores escape sequences and other keys', () => {
    expect(decodeKeys('\x1b[A')).toEqual([]);
    expect(decodeKeys('xyz\r')).toEqual([]);
  });

  it('keeps the order of a burst of keys', () => {
    expect(decodeKeys(' a q')).toEqual(['skip', 'skip', 'quit']);
  });
});

describe('KeyListener', () => {
  it('queues signals until drained', () => {
    const input = new PassThrough();
    const keys = new KeyListener(input);
    keys.start();
    input.emit('data', ' ');
    input.emit('data', Buffer.from('q'));
    expect(keys.drain()).toEqual(['skip', 'quit']);
    expect(keys.drain()).toEqual([]);
    keys.stop();
  });

  it('stops listening after stop()', () => {
    const input = new PassThrough();
    const keys = new KeyListener(input);
    keys.start();
    keys.stop();
    input.emit('data', ' ');
    expect(keys.drain()).toEqual([]);
  });

  it('switches a TTY into raw mode and back', () => {
    const input = Object.assign(new PassThrough(), { isTTY: true, setRawMode: vi.fn() });
    const keys = new KeyListener(input);
    keys.start();
    keys.stop();
    expect(input.setRawMode.mock.calls).toEqual([[true], [false]]);
  });

  it('stays stopped when raw mode cannot be entered', () => {
    const setRawMode = vi.fn(() => {
      throw new Error('not a TTY');
    });
    const input = Object.assign(new PassThrough(), { isTTY: true, setRawMode });
    const keys = new KeyListener(input);
    expect(() => keys.start()).toThrow('not a TTY');
    keys.stop();
    expect(setRawMode).toHaveBeenCalledTimes(1);
    input.emit('data', ' ');
    expect(keys.drain()).toEqual([]);
  });
});
