/**
 * Countdown to a local wall-clock instant.
 *
 * The target is fixed as a wall date when the program starts and turned back
 * into an instant on every tick, using the zone's offset at that moment, so a
 * DST switch or a changed host zone moves the instant with it.
 */

import { log } from '../log.js';
import type { CountdownMode, CountdownState, CountdownTarget, WallDate } from '../types.js';

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pick the zone to count down in: the preferred one if the runtime knows it,
 * else the system zone, else null (host-local Date arithmetic).
 */
export function resolveTimeZone(preferred?: string): string | null {
  if (preferred) {
    if (isValidTimeZone(preferred)) return preferred;
    log.warn('CLOCK', `Unknown time zone "${preferred}", using the system zone`);
  }
  let system: string | undefined;
  try {
    system = Intl.DateTimeFormat().resolvedOptions().timeZone;
  } catch (err) {
    log.warn('CLOCK', 'Could not read the system time zone', err);
  }
  if (system && isValidTimeZone(system)) return system;
  return null;
}

export function zonedDate(instant: number, timeZone: string | null): WallDate {
  if (timeZone === null) {
    const d = new Date(instant);
    return {
      year: d.getFullYear(),
      month: d.getMonth() + 1,
      day: d.getDate(),
      hour: d.getHours(),
      minute: d.getMinutes(),
      second: d.getSeconds(),
    };
  }
  const parts: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(new Date(instant))) {
    if (part.type !== 'literal') parts[part.type] = parseInt(part.value, 10);
  }
  return {
    year: parts.year,
    month: parts.month,
    day: parts.day,
    hour: parts.hour,
    minute: parts.minute,
    second: parts.second,
  };
}

function wallAsUtc(w: WallDate): number {
  return Date.UTC(w.year, w.month - 1, w.day, w.hour, w.minute, w.second);
}

// Zone offset in ms at the given instant (local = utc + offset)
function offsetAt(instant: number, timeZone: string): number {
  const whole = Math.floor(instant / 1000) * 1000;
  return wallAsUtc(zonedDate(whole, timeZone)) - whole;
}

const DAY_MS = 86_400_000;

/**
 * Instant at which the zone's clock shows `wall`. A repeated wall time maps
 * to its first occurrence; a skipped one moves forward by the gap, the way
 * Date does for host-local time (a midnight that never happens resolves to
 * the instant the day actually starts).
 */
export function wallClockToInstant(wall: WallDate, timeZone: string | null): number {
  if (timeZone === null) {
    return new Date(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second).getTime();
  }
  const asUtc = wallAsUtc(wall);
  // Offsets a day either side bracket any transition near the wall time
  const before = asUtc - offsetAt(asUtc - DAY_MS, timeZone);
  const after = asUtc - offsetAt(asUtc + DAY_MS, timeZone);
  const matches = [before, after].filter((at) => wallAsUtc(zonedDate(at, timeZone)) === asUtc);
  if (matches.length > 0) return Math.min(...matches);
  return before;
}

function midnightOf(year: number, month: number, day: number): WallDate {
  // Date.UTC normalises day overflow (Dec 32 -> Jan 1)
  const d = new Date(Date.UTC(year, month - 1, day));
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate(), hour: 0, minute: 0, second: 0 };
}

export function planTarget(
  mode: CountdownMode,
  now: Date,
  timeZone: string | null,
  seconds?: number,
): CountdownTarget {
  if (seconds !== undefined) {
    return { kind: 'instant', at: now.getTime() + Math.max(0, seconds) * 1000 };
  }
  const today = zonedDate(now.getTime(), timeZone);
  const date = mode === 'new-year'
    ? midnightOf(today.year + 1, 1, 1)
    : midnightOf(today.year, today.month, today.day + 1);
  return { kind: 'wall', date };
}

export function formatRemaining(ms: number): string {
  const total = Math.ceil(Math.max(0, ms) / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)}`;
}

export function computeCountdown(
  target: CountdownTarget,
  now: Date,
  timeZone: string | null,
  mode: CountdownMode,
): CountdownState {
  const at = target.kind === 'wall' ? wallClockToInstant(target.date, timeZone) : target.at;
  const remainingMs = Math.max(0, at - now.getTime());
  const reached = remainingMs === 0;

  let label = formatRemaining(remainingMs);
  if (reached && mode === 'new-year') {
    label = String(zonedDate(at, timeZone).year);
  }

  return { now, target: new Date(at), remainingMs, reached, label, timeZone };
}
