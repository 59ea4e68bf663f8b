/**
 * Braille canvas for terminal graphics.
 *
 * Each character cell holds a 2x4 block of dots:
 *   0 3
 *   1 4
 *   2 5
 *   6 7
 * Dot n sets bit n of the offset from U+2800.
 */

import type { GridSize, Rgb } from '../types.js';

const BRAILLE_OFFSET = 0x2800;
const BRAILLE_DOTS = [
  [0, 3],
  [1, 4],
  [2, 5],
  [6, 7],
] as const;

export const BLANK = String.fromCharCode(BRAILLE_OFFSET);
export const RESET = '\x1b[0m';
export const DEFAULT_INK = '\x1b[39m';

/** An ANSI foreground sequence. */
export type Ink = string;

export function rgbInk({ r, g, b }: Rgb): Ink {
  return `\x1b[38;2;${Math.round(r)};${Math.round(g)};${Math.round(b)}m`;
}

interface Cell {
  bits: number;
  ink: Ink | null;
}

export class BrailleCanvas {
  private cells: Cell[][] = [];
  private cols = 0;
  private rowCount = 0;

  constructor(columns: number, rows: number) {
    this.resize(columns, rows);
  }

  /** Width in dots. */
  get width(): number {
    return this.cols * 2;
  }

  /** Height in dots. */
  get height(): number {
    return this.rowCount * 4;
  }

  get size(): GridSize {
    return { columns: this.cols, rows: this.rowCount };
  }

  /** Returns true when the grid changed. */
  resize(columns: number, rows: number): boolean {
    const c = Math.max(1, Math.floor(columns));
    const r = Math.max(1, Math.floor(rows));
    if (c === this.cols && r === this.rowCount) return false;
    this.cols = c;
    this.rowCount = r;
    this.clear();
    return true;
  }

  clear(): void {
    this.cells = Array.from({ length: this.rowCount }, () =>
      Array.from({ length: this.cols }, (): Cell => ({ bits: 0, ink: null })),
    );
  }

  /** Set dots; points outside the canvas are ignored. */
  plot(ink: Ink, points: Iterable<readonly [number, number]>): void {
    const width = this.width;
    const height = this.height;
    for (const [px, py] of points) {
      const x = Math.floor(px);
      const y = Math.floor(py);
      if (x < 0 || x >= width || y < 0 || y >= height) continue;
      const cell = this.cells[y >> 2][x >> 1];
      cell.bits |= 1 << BRAILLE_DOTS[y & 3][x & 1];
      cell.ink = ink;
    }
  }

  line(x0: number, y0: number, x1: number, y1: number, ink: Ink): void {
    this.plot(ink, bresenham(Math.floor(x0), Math.floor(y0), Math.floor(x1), Math.floor(y1)));
  }

  /** Glyphs only, one string per row. */
  toLines(): string[] {
    return this.cells.map((row) => row.map((cell) => String.fromCharCode(BRAILLE_OFFSET + cell.bits)).join(''));
  }

  isBlank(): boolean {
    return this.cells.every((row) => row.every((cell) => cell.bits === 0));
  }

  /**
   * Glyphs with colour. Rows are joined by CR + cursor-down instead of a
   * newline so the last row never scrolls the screen.
   */
  render(): string {
    const lines: string[] = [];
    for (const row of this.cells) {
      const parts: string[] = [];
      let current: Ink | null = null;
      for (const cell of row) {
        if (cell.bits !== 0 && cell.ink !== current) {
          if (current !== null) parts.push(RESET);
          if (cell.ink !== null) parts.push(cell.ink);
          current = cell.ink;
        }
        parts.push(String.fromCharCode(BRAILLE_OFFSET + cell.bits));
      }
      if (current !== null) parts.push(RESET);
      lines.push(parts.join(''));
    }
    return lines.join('\r\x1b[B');
  }
}

function* bresenham(x0: number, y0: number, x1: number, y1: number): Generator<[number, number]> {
  const dx = Math.abs(x1 - x0);
  const dy = Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  let err = dx - dy;
  let x = x0;
  let y = y0;

  while (true) {
    yield [x, y];
    if (x === x1 && y === y1) return;
    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      x += sx;
    }
    if (e2 < dx) {
      err += dx;
      y += sy;
    }
  }
}

/**
 * Canvas grid for a terminal: one spare column and row so the cursor never
 * wraps or scrolls.
 */
export function canvasSize(terminal: GridSize): GridSize {
  return {
    columns: Math.max(1, terminal.columns - 1),
    rows: Math.max(1, terminal.rows - 1),
  };
}
