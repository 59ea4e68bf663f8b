/**
 * Show timeline: the fixed schedule of launches played once the countdown hits zero.
 *
 *   body   (0 .. duration):  one rocket every LAUNCH_GAP_MIN_S..MAX_S seconds
 *   finale (at duration):    FINALE_ROCKETS rockets at once, spread across the sky
 */

import { CONFIG, NEON_COLORS, WILLOW_GOLD } from '../config.js';
import { pick, randInt, uniform, type Random } from './random.js';
import type { BurstPattern, LaunchEvent, ShowTimeline } from '../types.js';

export interface TimelineOptions {
  durationS: number;
  gapMinS: number;
  gapMaxS: number;
  finaleRockets: number;
  countMin: number;
  countMax: number;
}

export const DEFAULT_TIMELINE: TimelineOptions = {
  durationS: CONFIG.SHOW_SECONDS,
  gapMinS: CONFIG.LAUNCH_GAP_MIN_S,
  gapMaxS: CONFIG.LAUNCH_GAP_MAX_S,
  finaleRockets: CONFIG.FINALE_ROCKETS,
  countMin: CONFIG.BURST_COUNT_MIN,
  countMax: CONFIG.BURST_COUNT_MAX,
};

// Weighted: peonies are the bread and butter of a show
const PATTERNS: BurstPattern[] = ['peony', 'peony', 'peony', 'ring', 'willow'];
const PALETTE = Object.values(NEON_COLORS);

export function randomLaunch(
  rng: Random,
  at: number,
  options: Pick<TimelineOptions, 'countMin' | 'countMax'> = DEFAULT_TIMELINE,
): LaunchEvent {
  const pattern = pick(rng, PATTERNS);
  return Object.freeze({
    at,
    count: randInt(rng, options.countMin, options.countMax),
    pattern,
    lane: uniform(rng, 0.2, 0.8),
    color: Object.freeze({ ...(pattern === 'willow' ? WILLOW_GOLD : pick(rng, PALETTE)) }),
  });
}

export function buildTimeline(rng: Random, options: TimelineOptions = DEFAULT_TIMELINE): ShowTimeline {
  if (!Number.isFinite(options.durationS)) {
    throw new RangeError(`Show duration must be a finite number of seconds, got ${options.durationS}`);
  }
  const events: LaunchEvent[] = [];
  const duration = Math.max(0, options.durationS);

  for (let t = 0; t < duration; t += Math.max(0.01, uniform(rng, options.gapMinS, options.gapMaxS))) {
    events.push(randomLaunch(rng, t, options));
  }

  for (let i = 0; i < options.finaleRockets; i++) {
    const launch = randomLaunch(rng, duration, options);
    // Spread the finale evenly instead of trusting the dice
    const lane = 0.2 + (0.6 * (i + 0.5)) / options.finaleRockets;
    events.push(Object.freeze({ ...launch, lane }));
  }

  return Object.freeze(events);
}
