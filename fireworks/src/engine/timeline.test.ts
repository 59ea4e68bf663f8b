import { describe, expect, it } from 'vitest';
import { buildTimeline, randomLaunch, type TimelineOptions } from './timeline.js';
import { mulberry32 } from './random.js';

const options: TimelineOptions = {
  durationS: 10,
  gapMinS: 0.2,
  gapMaxS: 0.8,
  finaleRockets: 4,
  countMin: 50,
  countMax: 80,
};

describe('buildTimeline', () => {
  it('opens at zero and stays sorted within the show', () => {
    const timeline = buildTimeline(mulberry32(1), options);
    expect(timeline[0].at).toBe(0);
    for (let i = 1; i < timeline.length; i++) {
      expect(timeline[i].at).toBeGreaterThanOrEqual(timeline[i - 1].at);
    }
    expect(timeline[timeline.length - 1].at).toBe(10);
  });

  it('keeps body launches within the configured gaps', () => {
    const body = buildTimeline(mulberry32(2), options).filter((e) => e.at < 10);
    for (let i = 1; i < body.length; i++) {
      const gap = body[i].at - body[i - 1].at;
      expect(gap).toBeGreaterThanOrEqual(0.2 - 1e-9);
      expect(gap).toBeLessThanOrEqual(0.8 + 1e-9);
    }
  });

  it('ends with a finale spread across the sky', () => {
    const finale = buildTimeline(mulberry32(3), options).filter((e) => e.at === 10);
    expect(finale.map((e) => e.lane)).toEqual([0.275, 0.425, 0.575, 0.725].map((l) => expect.closeTo(l, 10)));
  });

  it('is frozen after it is built', () => {
    const timeline = buildTimeline(mulberry32(4), options);
    expect(Object.isFrozen(timeline)).toBe(true);
    expect(Object.isFrozen(timeline[0])).toBe(true);
    expect(Object.isFrozen(timeline[0].color)).toBe(true);
  });

  it('replays the same show from the same seed', () => {
    expect(buildTimeline(mulberry32(5), options)).toEqual(buildTimeline(mulberry32(5), options));
  });

  it('is empty without a duration or finale', () => {
    expect(buildTimeline(mulberry32(6), { ...options, durationS: 0, finaleRockets: 0 })).toEqual([]);
  });

  it('refuses a duration that is not a number', () => {
    expect(() => buildTimeline(mulberry32(8), { ...options, durationS: Number('abc') })).toThrow(RangeError);
    expect(() => buildTimeline(mulberry32(8), { ...options, durationS: Infinity })).toThrow(RangeError);
  });
});

describe('randomLaunch', () => {
  it('stays within the burst size and lane bounds', () => {
    const rng = mulberry32(7);
    for (let i = 0; i < 50; i++) {
      const launch = randomLaunch(rng, 1, options);
      expect(launch.count).toBeGreaterThanOrEqual(50);
      expect(launch.count).toBeLessThanOrEqual(80);
      expect(launch.lane).toBeGreaterThanOrEqual(0.2);
      expect(launch.lane).toBeLessThan(0.8);
    }
  });
});
