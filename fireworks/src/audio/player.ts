import { spawn } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { CONFIG } from '../config.js';
import { log } from '../log.js';
import type { CueFiles } from './sounds.js';
import type { AudioCue } from '../types.js';

export interface PlayerCommand {
  command: string;
  args: (file: string) => string[];
}

/** Starts a player process and reports once when it is done. */
export type Spawner = (command: string, args: string[], onDone: (err: Error | null) => void) => void;

const LINUX_PLAYERS: PlayerCommand[] = [
  { command: 'paplay', args: (file) => [file] },
  { command: 'aplay', args: (file) => ['-q', file] },
  { command: 'ffplay', args: (file) => ['-nodisp', '-autoexit', '-loglevel', 'quiet', file] },
];

function onPath(command: string, searchPath: string, exists: (p: string) => boolean): boolean {
  return searchPath
    .split(path.delimiter)
    .filter(Boolean)
    .some((dir) => exists(path.join(dir, command)));
}

export function detectPlayer(
  platform: NodeJS.Platform = process.platform,
  searchPath: string = process.env.PATH ?? '',
  exists: (p: string) => boolean = fs.existsSync,
): PlayerCommand | null {
  if (platform === 'darwin') {
    return { command: 'afplay', args: (file) => [file] };
  }
  if (platform === 'win32') {
    return {
      command: 'powershell',
      args: (file) => ['-NoProfile', '-c', `(New-Object Media.SoundPlayer '${file.replace(/'/g, "''")}').PlaySync()`],
    };
  }
  return LINUX_PLAYERS.find((p) => onPath(p.command, searchPath, exists)) ?? null;
}

export const spawnPlayer: Spawner = (command, args, onDone) => {
  let settled = false;
  const done = (err: Error | null) => {
    if (settled) return;
    settled = true;
    onDone(err);
  };
  try {
    const child = spawn(command, args, { stdio: 'ignore' });
    child.once('error', (err) => done(err));
    child.once('exit', (code) => done(code === 0 ? null : new Error(`${command} exited with code ${code}`)));
  } catch (err) {
    done(err instanceof Error ? err : new Error(String(err)));
  }
};

export interface AudioTriggerOptions {
  player: PlayerCommand | null;
  files: CueFiles;
  spawner?: Spawner;
  maxConcurrent?: number;
  failureThreshold?: number;
}

/**
 * Fire-and-forget sound cues. play() never blocks and never throws: it drops
 * cues while too many players are busy and goes silent after repeated
 * player failures.
 */
export class AudioTrigger {
  private active = 0;
  private consecutiveFailures = 0;
  private disabled: boolean;
  private readonly spawner: Spawner;
  private readonly maxConcurrent: number;
  private readonly failureThreshold: number;

  constructor(private readonly options: AudioTriggerOptions) {
    this.spawner = options.spawner ?? spawnPlayer;
    this.maxConcurrent = options.maxConcurrent ?? CONFIG.AUDIO_MAX_CONCURRENT;
    this.failureThreshold = options.failureThreshold ?? CONFIG.AUDIO_FAILURE_THRESHOLD;
    this.disabled = options.player === null;
  }

  get enabled(): boolean {
    return !this.disabled;
  }

  get playing(): number {
    return this.active;
  }

  play(cue: AudioCue): void {
    const player = this.options.player;
    if (this.disabled || !player) return;
    if (this.active >= this.maxConcurrent) return;

    this.active++;
    try {
      this.spawner(player.command, player.args(this.options.files[cue]), (err) => this.settle(err));
    } catch (err) {
      this.settle(err instanceof Error ? err : new Error(String(err)));
    }
  }

  private settle(err: Error | null): void {
    this.active = Math.max(0, this.active - 1);
    if (!err) {
      this.consecutiveFailures = 0;
      return;
    }
    this.consecutiveFailures++;
    if (this.consecutiveFailures >= this.failureThreshold && !this.disabled) {
      this.disabled = true;
      log.warn('AUDIO', `Player failed ${this.consecutiveFailures} times in a row, continuing without sound`, err);
    } else if (this.consecutiveFailures === 1) {
      log.warn('AUDIO', `${this.options.player?.command ?? 'player'} failed`, err);
    }
  }
}
