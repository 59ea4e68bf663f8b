import { parseArgs } from 'node:util';
import { CONFIG } from '../config.js';
import type { CountdownMode } from '../types.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  help: boolean;
  skip: boolean;
  mute: boolean;
  mode: CountdownMode;
  timeZone?: string;
  seconds?: number;
  durationS: number;
}

export const USAGE = `Usage: fireworks [options]

Counts down to local midnight, then fills the terminal with fireworks.

Options:
  -s, --skip               start the show right away (same as pressing SPACE)
      --seconds <n>        count down n seconds instead
      --target <mode>      midnight (default) or new-year
      --tz <zone>          IANA time zone to count down in
      --duration <s>       length of the show in seconds (default ${CONFIG.SHOW_SECONDS})
      --mute               no sound
  -h, --help               show this help

Keys: SPACE skip / launch a rocket, q or ESC quit`;

function toMode(value: string): CountdownMode {
  if (value === 'midnight' || value === 'new-year') return value;
  throw new UsageError(`--target must be "midnight" or "new-year", got "${value}"`);
}

function toSeconds(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new UsageError(`--${flag} needs a non-negative number, got "${value}"`);
  }
  return n;
}

const OPTIONS = {
  skip: { type: 'boolean', short: 's', default: false },
  seconds: { type: 'string' },
  target: { type: 'string' },
  tz: { type: 'string' },
  duration: { type: 'string' },
  mute: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);
  // CONFIG.TARGET may come from the environment
  const target: string = values.target ?? CONFIG.TARGET;

  return {
    help: values.help ?? false,
    skip: values.skip ?? false,
    mute: (values.mute ?? false) || !CONFIG.AUDIO_ENABLED,
    mode: toMode(target),
    timeZone: values.tz ?? CONFIG.TIME_ZONE,
    seconds: toSeconds('seconds', values.seconds),
    durationS: toSeconds('duration', values.duration) ?? CONFIG.SHOW_SECONDS,
  };
}
