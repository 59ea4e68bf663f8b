#!/usr/bin/env node
import 'dotenv/config';
import { CONFIG } from './config.js';
import { log } from './log.js';
import { USAGE, UsageError, parseCliArgs, type CliOptions } from './cli/args.js';
import { resolveTimeZone } from './clock/countdown.js';
import { buildTimeline, DEFAULT_TIMELINE } from './engine/timeline.js';
import { createShowState } from './engine/show.js';
import { runShow } from './engine/loop.js';
import { canvasSize } from './render/braille.js';
import { AudioTrigger, detectPlayer } from './audio/player.js';
import { removeCueFiles, writeCueFiles, type CueFiles } from './audio/sounds.js';
import { KeyListener } from './input/keys.js';
import { Screen, TerminalError, assertTerminalCapable, withScreen } from './terminal/screen.js';
import type { FinishReason } from './types.js';

interface AudioSetup {
  trigger: AudioTrigger;
  files: CueFiles;
}

function setUpAudio(options: CliOptions): AudioSetup | null {
  if (options.mute) return null;

  const player = detectPlayer();
  if (!player) {
    log.warn('AUDIO', 'No audio player found (afplay, paplay, aplay or ffplay), continuing without sound');
    return null;
  }
  try {
    const files = writeCueFiles(CONFIG.AUDIO_SAMPLE_RATE);
    return { trigger: new AudioTrigger({ player, files }), files };
  } catch (err) {
    log.warn('AUDIO', 'Could not prepare sound cues, continuing without sound', err);
    return null;
  }
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  try {
    assertTerminalCapable(process.stdout);
  } catch (err) {
    if (err instanceof TerminalError) {
      log.error('TERM', err.message);
      return 1;
    }
    throw err;
  }

  const timeZone = resolveTimeZone(options.timeZone);
  const screen = new Screen(process.stdout);
  const keys = new KeyListener(process.stdin);
  const audio = setUpAudio(options);

  const state = createShowState({
    now: new Date(),
    mode: options.mode,
    timeZone,
    timeline: buildTimeline(Math.random, { ...DEFAULT_TIMELINE, durationS: options.durationS }),
    grid: canvasSize(screen.size()),
    countdownSeconds: options.seconds,
  });

  console.log('=== Midnight Fireworks ===');
  log.info('CLOCK', `Counting down to ${state.countdown.target.toISOString()} (${timeZone ?? 'host local time'})`);
  log.info('SHOW', 'SPACE skips the countdown or launches a rocket, q quits');

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  let reason: FinishReason = 'quit';
  try {
    reason = await withScreen(screen, keys, () =>
      runShow(
        state,
        { screen, keys, audio: audio?.trigger ?? null, rng: Math.random, signal: controller.signal },
        { fps: CONFIG.FPS, initialSignals: options.skip ? ['skip'] : [] },
      ),
    );
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    if (audio) removeCueFiles(audio.files);
  }

  log.info('SHOW', reason === 'complete' ? 'Happy new day! Thanks for watching.' : 'Show stopped.');
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
