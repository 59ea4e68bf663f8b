import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { mulberry32, type Random } from '../engine/random.js';
import { encodeWav } from './wav.js';
import type { AudioCue } from '../types.js';

export type CueFiles = Record<AudioCue, string>;

// One-pole low-pass over white noise; alpha in (0, 1], lower = duller
function filteredNoise(rng: Random, alpha: number): () => number {
  let last = 0;
  return () => {
    last += alpha * (rng() * 2 - 1 - last);
    return last;
  };
}

/** Rising whoosh with a faint whistle, like a rocket leaving the tube. */
export function synthLaunch(sampleRate: number, rng: Random = mulberry32(1)): Float32Array {
  const length = Math.floor(sampleRate * 0.45);
  const out = new Float32Array(length);
  const noise = filteredNoise(rng, 0.35);
  let phase = 0;

  for (let i = 0; i < length; i++) {
    const t = i / length;
    const envelope = Math.sin(Math.PI * t) * (1 - 0.4 * t);
    phase += (2 * Math.PI * (600 + 1400 * t)) / sampleRate;
    out[i] = envelope * (0.55 * noise() + 0.12 * Math.sin(phase));
  }
  return out;
}

/** Sharp crack followed by a decaying rumble. */
export function synthExplosion(sampleRate: number, rng: Random = mulberry32(2)): Float32Array {
  const length = Math.floor(sampleRate * 1.1);
  const attack = Math.floor(sampleRate * 0.004);
  const out = new Float32Array(length);
  const crack = filteredNoise(rng, 0.9);
  const rumble = filteredNoise(rng, 0.05);

  for (let i = 0; i < length; i++) {
    const seconds = i / sampleRate;
    const rise = i < attack ? i / attack : 1;
    const body = Math.exp(-seconds * 4) * 4 * rumble();
    const snap = Math.exp(-seconds * 30) * crack();
    out[i] = rise * Math.max(-1, Math.min(1, 0.8 * snap + body));
  }
  return out;
}

/**
 * Synthesise the cues and write them as WAV files so a system player can
 * pick them up. Returns the file paths keyed by cue.
 */
export function writeCueFiles(sampleRate: number, dir?: string): CueFiles {
  const target = dir ?? fs.mkdtempSync(path.join(os.tmpdir(), 'midnight-fireworks-'));
  fs.mkdirSync(target, { recursive: true });

  const files: CueFiles = {
    launch: path.join(target, 'launch.wav'),
    explode: path.join(target, 'explode.wav'),
  };
  fs.writeFileSync(files.launch, encodeWav(synthLaunch(sampleRate), sampleRate));
  fs.writeFileSync(files.explode, encodeWav(synthExplosion(sampleRate), sampleRate));
  return files;
}

export function removeCueFiles(files: CueFiles): void {
  for (const file of Object.values(files)) fs.rmSync(file, { force: true });
  const dir = path.dirname(files.launch);
  if (fs.existsSync(dir) && fs.readdirSync(dir).length === 0) fs.rmdirSync(dir);
}
