import type { KeySignal } from '../types.js';

const CTRL_C = '\x03';
const ESC = '\x1b';

export function decodeKeys(chunk: string): KeySignal[] {
  if (chunk === ESC) return ['quit'];
  // Arrow keys and other escape sequences arrive as one chunk
  if (chunk.startsWith(ESC)) return [];

  const signals: KeySignal[] = [];
  for (const char of chunk) {
    if (char === ' ') signals.push('skip');
    else if (char === 'q' || char === 'Q' || char === CTRL_C) signals.push('quit');
  }
  return signals;
}

export interface KeyInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

/**
 * Queues key signals as they arrive; the loop drains them once per frame so
 * reading input never blocks a frame.
 */
export class KeyListener {
  private pending: KeySignal[] = [];
  private listening = false;

  private readonly onData = (chunk: string | Buffer) => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    this.pending.push(...decodeKeys(text));
  };

  constructor(private readonly input: KeyInput) {}

  start(): void {
    if (this.listening) return;
    if (this.input.isTTY && this.input.setRawMode) this.input.setRawMode(true);
    this.listening = true;
    this.input.setEncoding('utf8');
    this.input.on('data', this.onData);
    this.input.resume();
  }

  stop(): void {
    if (!this.listening) return;
    this.listening = false;
    this.input.off('data', this.onData);
    if (this.input.isTTY && this.input.setRawMode) this.input.setRawMode(false);
    this.input.pause();
  }

  /** Signals received since the last call, oldest first. */
  drain(): KeySignal[] {
    const signals = this.pending;
    this.pending = [];
    return signals;
  }
}
