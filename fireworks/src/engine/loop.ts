import { CONFIG } from '../config.js';
import { BrailleCanvas, canvasSize } from '../render/braille.js';
import { drawFrame } from '../render/frame.js';
import { tickShow } from './show.js';
import type { Random } from './random.js';
import type { AudioCue, FinishReason, GridSize, KeySignal, ShowState } from '../types.js';

export interface LoopDeps {
  screen: { size(): GridSize; draw(frame: string): void };
  keys: { drain(): KeySignal[] };
  audio: { play(cue: AudioCue): void } | null;
  rng: Random;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
}

export interface LoopOptions {
  fps?: number;
  maxDt?: number;
  /** Signals injected on the first tick, e.g. a skip from the command line. */
  initialSignals?: KeySignal[];
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run the show until it finishes or the user quits: one tick, one frame and
 * one input check per iteration, paced to the frame rate.
 */
export async function runShow(state: ShowState, deps: LoopDeps, options: LoopOptions = {}): Promise<FinishReason> {
  const clock = deps.clock ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;
  const frameMs = 1000 / Math.max(1, options.fps ?? CONFIG.FPS);
  const maxDt = options.maxDt ?? CONFIG.MAX_FRAME_DT_S;
  const canvas = new BrailleCanvas(state.grid.columns, state.grid.rows);

  let pending = [...(options.initialSignals ?? [])];
  let last = clock();

  while (state.phase !== 'finished') {
    const start = clock();
    if (deps.signal?.aborted) {
      state.phase = 'finished';
      state.finishReason = 'quit';
      break;
    }

    const dt = Math.min(maxDt, Math.max(0, (start - last) / 1000));
    last = start;

    const signals = [...pending, ...deps.keys.drain()];
    pending = [];

    const events = tickShow(
      state,
      { now: new Date(start), dt, signals, grid: canvasSize(deps.screen.size()) },
      { rng: deps.rng },
    );
    // Sound is fire-and-forget; the frame never waits on it
    if (deps.audio) {
      for (const event of events) deps.audio.play(event.type);
    }

    deps.screen.draw(drawFrame(canvas, state));
    if (state.phase === 'finished') break;

    const elapsed = clock() - start;
    await sleep(Math.max(0, frameMs - elapsed));
  }

  return state.finishReason ?? 'complete';
}
