import { afterEach, describe, expect, it, vi } from 'vitest';
import { CONFIG, envNumber } from './config.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('envNumber', () => {
  it('reads a number from the environment', () => {
    expect(envNumber('FIREWORKS_SHOW_SECONDS', 45, 0, { FIREWORKS_SHOW_SECONDS: '12.5' })).toBe(12.5);
  });

  it('uses the fallback quietly when the variable is unset or blank', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(envNumber('FIREWORKS_FPS', 60, 1, {})).toBe(60);
    expect(envNumber('FIREWORKS_FPS', 60, 1, { FIREWORKS_FPS: ' ' })).toBe(60);
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns and falls back on a value that is not a number', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(envNumber('FIREWORKS_SHOW_SECONDS', 45, 0, { FIREWORKS_SHOW_SECONDS: 'abc' })).toBe(45);
    expect(warn).toHaveBeenCalledWith('[CONFIG] FIREWORKS_SHOW_SECONDS="abc" is not a number >= 0, using 45');
  });

  it('warns and falls back below the minimum', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(envNumber('FIREWORKS_FPS', 60, 1, { FIREWORKS_FPS: '0' })).toBe(60);
    expect(envNumber('FIREWORKS_FPS', 60, 1, { FIREWORKS_FPS: '-5' })).toBe(60);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});

describe('CONFIG', () => {
  it('always holds usable loop and show numbers', () => {
    expect(Number.isFinite(CONFIG.FPS)).toBe(true);
    expect(CONFIG.FPS).toBeGreaterThanOrEqual(1);
    expect(Number.isFinite(CONFIG.SHOW_SECONDS)).toBe(true);
  });
});
