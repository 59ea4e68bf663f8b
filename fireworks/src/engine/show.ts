/**
 * Show state machine.
 *
 *   waiting  -> show      countdown hits zero, or a skip signal
 *   show     -> finished  every timeline launch spawned and the sky is empty
 *   any      -> finished  quit signal
 *
 * All simulation data lives in the ShowState passed in; tickShow mutates it
 * and returns the audio-worthy events of the tick.
 */

import { computeCountdown, planTarget } from '../clock/countdown.js';
import { launchRocket, stepParticles, DEFAULT_PHYSICS } from './particles.js';
import { randomLaunch } from './timeline.js';
import type { Random } from './random.js';
import type { PhysicsConfig } from '../config.js';
import type { CountdownMode, GridSize, KeySignal, ShowEvent, ShowState, ShowTimeline } from '../types.js';

export interface ShowSetup {
  now: Date;
  mode: CountdownMode;
  timeZone: string | null;
  timeline: ShowTimeline;
  grid: GridSize;
  countdownSeconds?: number;
}

export interface TickInput {
  now: Date;
  dt: number;                 // seconds since the previous tick
  signals: readonly KeySignal[];
  grid: GridSize;
}

export interface TickContext {
  rng: Random;
  physics?: PhysicsConfig;
}

export function createShowState(setup: ShowSetup): ShowState {
  const target = planTarget(setup.mode, setup.now, setup.timeZone, setup.countdownSeconds);
  return {
    phase: 'waiting',
    mode: setup.mode,
    target,
    timeZone: setup.timeZone,
    countdown: computeCountdown(target, setup.now, setup.timeZone, setup.mode),
    timeline: setup.timeline,
    nextLaunch: 0,
    showElapsed: 0,
    particles: [],
    grid: { ...setup.grid },
    frame: 0,
    finishReason: null,
  };
}

function launchDue(state: ShowState, ctx: TickContext, physics: PhysicsConfig, events: ShowEvent[]): void {
  while (state.nextLaunch < state.timeline.length && state.timeline[state.nextLaunch].at <= state.showElapsed) {
    const rocket = launchRocket(state.timeline[state.nextLaunch], state.grid, ctx.rng, physics);
    state.particles.push(rocket);
    events.push({ type: 'launch', x: rocket.x, y: rocket.y, pattern: rocket.burst.pattern });
    state.nextLaunch++;
  }
}

export function tickShow(state: ShowState, input: TickInput, ctx: TickContext): ShowEvent[] {
  const physics = ctx.physics ?? DEFAULT_PHYSICS;
  const events: ShowEvent[] = [];
  if (state.phase === 'finished') return events;

  state.frame++;
  state.grid = { ...input.grid };
  state.countdown = computeCountdown(state.target, input.now, state.timeZone, state.mode);

  let started = false;
  let extraLaunches = 0;
  for (const signal of input.signals) {
    if (signal === 'quit') {
      state.phase = 'finished';
      state.finishReason = 'quit';
      return events;
    }
    if (state.phase === 'waiting') {
      state.phase = 'show';
      started = true;
    } else {
      extraLaunches++;
    }
  }

  if (state.phase === 'waiting' && state.countdown.reached) {
    state.phase = 'show';
    started = true;
  }
  if (state.phase !== 'show') return events;

  const stepped = stepParticles(state.particles, input.dt, state.grid, ctx.rng, physics);
  state.particles = stepped.particles;
  events.push(...stepped.events);

  // The show clock starts at zero on the tick the show begins
  if (!started) state.showElapsed += input.dt;
  launchDue(state, ctx, physics, events);

  for (let i = 0; i < extraLaunches; i++) {
    const rocket = launchRocket(randomLaunch(ctx.rng, state.showElapsed), state.grid, ctx.rng, physics);
    state.particles.push(rocket);
    events.push({ type: 'launch', x: rocket.x, y: rocket.y, pattern: rocket.burst.pattern });
  }

  if (state.nextLaunch >= state.timeline.length && state.particles.length === 0) {
    state.phase = 'finished';
    state.finishReason = 'complete';
  }
  return events;
}
