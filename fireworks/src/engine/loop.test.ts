import { describe, expect, it } from 'vitest';
import { runShow, type LoopDeps } from './loop.js';
import { createShowState } from './show.js';
import { mulberry32 } from './random.js';
import type { AudioCue, KeySignal, LaunchEvent } from '../types.js';

const start = Date.UTC(2026, 0, 1, 12, 0, 0);

function launchAt(at: number, lane: number): LaunchEvent {
  return { at, count: 30, pattern: 'ring', lane, color: { r: 255, g: 128, b: 0 } };
}

function harness(keyScript: KeySignal[][] = []) {
  let now = start;
  const frames: string[] = [];
  const cues: { cue: AudioCue; frame: number }[] = [];
  const guard = new AbortController();
  let drains = 0;

  const deps: LoopDeps = {
    screen: {
      size: () => ({ columns: 80, rows: 24 }),
      draw: (frame) => {
        frames.push(frame);
        // Bail out instead of hanging if the show never ends
        if (frames.length > 5000) guard.abort();
      },
    },
    keys: { drain: () => keyScript[drains++] ?? [] },
    audio: { play: (cue) => cues.push({ cue, frame: frames.length }) },
    rng: mulberry32(7),
    clock: () => now,
    sleep: async (ms) => {
      now += ms;
    },
    signal: guard.signal,
  };
  const state = createShowState({
    now: new Date(start),
    mode: 'midnight',
    timeZone: 'UTC',
    timeline: [launchAt(0, 0.3), launchAt(0.5, 0.7)],
    grid: { columns: 79, rows: 23 },
    countdownSeconds: 2,
  });
  return { deps, state, frames, cues };
}

describe('runShow', () => {
  it('counts down, plays the show and finishes', async () => {
    const { deps, state, frames, cues } = harness();
    const reason = await runShow(state, deps, { fps: 30 });

    expect(reason).toBe('complete');
    expect(state.phase).toBe('finished');
    expect(cues.filter((c) => c.cue === 'launch')).toHaveLength(2);
    expect(cues.filter((c) => c.cue === 'explode')).toHaveLength(2);
    // Two seconds of countdown at 30 fps come before the first launch
    expect(cues[0].frame).toBeGreaterThanOrEqual(59);
    expect(frames[0].startsWith('\x1b[H')).toBe(true);
  });

  it('starts the show on the first frame when skipped from the command line', async () => {
    const { deps, state, cues } = harness();
    const reason = await runShow(state, deps, { fps: 30, initialSignals: ['skip'] });
    expect(reason).toBe('complete');
    expect(cues[0]).toEqual({ cue: 'launch', frame: 0 });
  });

  it('stops when the user quits', async () => {
    const { deps, state, frames } = harness([[], [], ['quit']]);
    const reason = await runShow(state, deps, { fps: 30 });
    expect(reason).toBe('quit');
    expect(frames).toHaveLength(3);
  });

  it('stops when aborted from outside', async () => {
    const { deps, state, frames } = harness();
    const controller = new AbortController();
    controller.abort();
    const reason = await runShow(state, { ...deps, signal: controller.signal }, { fps: 30 });
    expect(reason).toBe('quit');
    expect(frames).toEqual([]);
  });

  it('runs silently without audio', async () => {
    const { deps, state } = harness();
    const reason = await runShow(state, { ...deps, audio: null }, { fps: 30, initialSignals: ['skip'] });
    expect(reason).toBe('complete');
  });
});
