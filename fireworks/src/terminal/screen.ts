import { CONFIG } from '../config.js';
import { holdLogs, releaseLogs } from '../log.js';
import type { GridSize } from '../types.js';

const ENTER_ALT_SCREEN = '\x1b[?1049h\x1b[?25l\x1b[2J';
const LEAVE_ALT_SCREEN = '\x1b[?1049l\x1b[?25h';

export type TerminalErrorCode = 'NO_TTY' | 'NO_UNICODE';

export class TerminalError extends Error {
  constructor(
    message: string,
    readonly code: TerminalErrorCode,
  ) {
    super(message);
    this.name = 'TerminalError';
  }
}

export interface TerminalOutput {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
  write(chunk: string): boolean;
}

/**
 * Fails when frames cannot be shown: output is not a terminal, or the
 * locale says the terminal will not take UTF-8 braille glyphs.
 */
export function assertTerminalCapable(
  output: Pick<TerminalOutput, 'isTTY'>,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  forceUnicode: boolean = CONFIG.FORCE_UNICODE,
): void {
  if (!output.isTTY) {
    throw new TerminalError('Standard output is not a terminal; run the show in an interactive terminal', 'NO_TTY');
  }
  if (forceUnicode || platform === 'win32') return;

  const locale = env.LC_ALL || env.LC_CTYPE || env.LANG;
  if (locale && !/utf-?8/i.test(locale)) {
    throw new TerminalError(
      `Locale "${locale}" is not UTF-8; braille glyphs will not render (set LANG to a UTF-8 locale or FIREWORKS_FORCE_UNICODE=1)`,
      'NO_UNICODE',
    );
  }
}

export class Screen {
  private active = false;

  constructor(private readonly output: TerminalOutput) {}

  /** Current terminal size, falling back to 80x24 when it is unknown. */
  size(): GridSize {
    return {
      columns: this.output.columns || CONFIG.FALLBACK_COLUMNS,
      rows: this.output.rows || CONFIG.FALLBACK_ROWS,
    };
  }

  enter(): void {
    if (this.active) return;
    this.active = true;
    this.output.write(ENTER_ALT_SCREEN);
  }

  draw(frame: string): void {
    if (!this.active) return;
    this.output.write(frame);
  }

  leave(): void {
    if (!this.active) return;
    this.active = false;
    this.output.write(LEAVE_ALT_SCREEN);
  }
}

/**
 * Run `body` with the show owning the terminal. Whatever fails, including
 * entering raw mode, the screen and input are restored and held log lines
 * are printed.
 */
export async function withScreen<T>(
  screen: Pick<Screen, 'enter' | 'leave'>,
  keys: { start(): void; stop(): void },
  body: () => Promise<T>,
): Promise<T> {
  holdLogs();
  try {
    screen.enter();
    keys.start();
    return await body();
  } finally {
    keys.stop();
    screen.leave();
    releaseLogs();
  }
}
