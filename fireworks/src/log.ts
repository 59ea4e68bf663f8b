// Tagged console logging. While the show owns the screen, lines are held
// and printed once the terminal is restored.

type Level = 'info' | 'warn' | 'error';

interface HeldLine {
  level: Level;
  line: string;
}

let held: HeldLine[] | null = null;

function emit(level: Level, tag: string, message: string, err?: unknown): void {
  const detail = err instanceof Error ? `: ${err.message}` : err !== undefined ? `: ${String(err)}` : '';
  const line = `[${tag}] ${message}${detail}`;
  if (held) {
    held.push({ level, line });
    return;
  }
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export const log = {
  info: (tag: string, message: string): void => emit('info', tag, message),
  warn: (tag: string, message: string, err?: unknown): void => emit('warn', tag, message, err),
  error: (tag: string, message: string, err?: unknown): void => emit('error', tag, message, err),
};

export function holdLogs(): void {
  if (!held) held = [];
}

export function releaseLogs(): void {
  const pending = held ?? [];
  held = null;
  for (const { level, line } of pending) {
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }
}
