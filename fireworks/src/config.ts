import { log } from './log.js';

/** Number from the environment; a missing value gives the fallback, a bad one a warning too. */
export function envNumber(name: string, fallback: number, min = 0, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (Number.isFinite(value) && value >= min) return value;
  log.warn('CONFIG', `${name}="${raw}" is not a number >= ${min}, using ${fallback}`);
  return fallback;
}

export const CONFIG = {
  // Loop settings
  FPS: envNumber('FIREWORKS_FPS', 60, 1),
  MAX_FRAME_DT_S: 0.1,           // clamp after a stalled terminal or a suspend

  // Countdown settings
  TIME_ZONE: process.env.FIREWORKS_TZ || undefined,
  TARGET: process.env.FIREWORKS_TARGET || 'midnight',

  // Show timeline
  SHOW_SECONDS: envNumber('FIREWORKS_SHOW_SECONDS', 45),
  LAUNCH_GAP_MIN_S: 0.2,
  LAUNCH_GAP_MAX_S: 0.8,
  FINALE_ROCKETS: 6,
  BURST_COUNT_MIN: 120,
  BURST_COUNT_MAX: 260,

  // Physics (cell units, y grows downwards)
  CELL_ASPECT: 2,                // a cell is about twice as tall as it is wide
  ROCKET_GRAVITY: 25,
  ROCKET_DRIFT: 6,
  ROCKET_APEX_MIN: 0.15,         // apex height as a fraction of the grid, from the top
  ROCKET_APEX_MAX: 0.4,
  ROCKET_TRAIL_LENGTH: 8,
  SPARK_GRAVITY: 2.5,
  SPARK_DRAG_PER_S: 0.16,        // velocity kept after one second
  SPARK_SPEED_MIN: 28,
  SPARK_SPEED_MAX: 40,
  SPARK_LIFE_MIN_S: 1.6,
  SPARK_LIFE_MAX_S: 2.7,
  WILLOW_GRAVITY: 5,
  WILLOW_DRAG_PER_S: 0.4,
  WILLOW_LIFE_MIN_S: 3,
  WILLOW_LIFE_MAX_S: 4,

  // Audio settings
  AUDIO_ENABLED: process.env.FIREWORKS_MUTE !== '1',
  AUDIO_SAMPLE_RATE: 22050,
  AUDIO_MAX_CONCURRENT: 6,
  AUDIO_FAILURE_THRESHOLD: 3,    // consecutive player failures before going silent

  // Terminal settings
  FORCE_UNICODE: process.env.FIREWORKS_FORCE_UNICODE === '1',
  FALLBACK_COLUMNS: 80,
  FALLBACK_ROWS: 24,
} as const;

type PhysicsKey =
  | 'CELL_ASPECT'
  | 'ROCKET_GRAVITY'
  | 'ROCKET_DRIFT'
  | 'ROCKET_APEX_MIN'
  | 'ROCKET_APEX_MAX'
  | 'ROCKET_TRAIL_LENGTH'
  | 'SPARK_GRAVITY'
  | 'SPARK_DRAG_PER_S'
  | 'SPARK_SPEED_MIN'
  | 'SPARK_SPEED_MAX'
  | 'SPARK_LIFE_MIN_S'
  | 'SPARK_LIFE_MAX_S'
  | 'WILLOW_GRAVITY'
  | 'WILLOW_DRAG_PER_S'
  | 'WILLOW_LIFE_MIN_S'
  | 'WILLOW_LIFE_MAX_S';

export type PhysicsConfig = Record<PhysicsKey, number>;

// Neon palette the rockets pick from
export const NEON_COLORS: Record<string, { r: number; g: number; b: number }> = {
  magenta:     { r: 255, g: 0,   b: 255 },
  cyan:        { r: 0,   g: 255, b: 255 },
  yellow:      { r: 255, g: 255, b: 0 },
  hotPink:     { r: 255, g: 0,   b: 128 },
  springGreen: { r: 0,   g: 255, b: 128 },
  orange:      { r: 255, g: 128, b: 0 },
  purple:      { r: 128, g: 0,   b: 255 },
  red:         { r: 255, g: 0,   b: 0 },
  green:       { r: 0,   g: 255, b: 0 },
  lightBlue:   { r: 0,   g: 128, b: 255 },
};

export const WILLOW_GOLD = { r: 255, g: 190, b: 60 } as const;
