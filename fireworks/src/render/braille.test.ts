import { describe, expect, it } from 'vitest';
import { BLANK, BrailleCanvas, RESET, canvasSize, rgbInk } from './braille.js';

describe('BrailleCanvas', () => {
  it('maps dots to the braille bit layout', () => {
    const canvas = new BrailleCanvas(2, 1);
    canvas.plot('A', [[0, 0], [3, 3]]);
    expect(canvas.toLines()).toEqual(['⠁⢀']);
  });

  it('fills a whole cell', () => {
    const canvas = new BrailleCanvas(1, 1);
    const all: [number, number][] = [];
    for (let y = 0; y < 4; y++) for (let x = 0; x < 2; x++) all.push([x, y]);
    canvas.plot('A', all);
    expect(canvas.toLines()).toEqual(['⣿']);
  });

  it('ignores points outside the canvas', () => {
    const canvas = new BrailleCanvas(1, 1);
    canvas.plot('A', [[-1, 0], [2, 0], [0, 4], [0, -0.5]]);
    expect(canvas.isBlank()).toBe(true);
  });

  it('floors fractional dot positions', () => {
    const canvas = new BrailleCanvas(1, 1);
    canvas.plot('A', [[1.9, 2.2]]);
    expect(canvas.toLines()).toEqual(['⠠']);
  });

  it('draws Bresenham lines', () => {
    const canvas = new BrailleCanvas(2, 1);
    canvas.line(0, 0, 3, 3, 'A');
    expect(canvas.toLines()).toEqual(['⠑⢄']);
  });

  it('renders ink only where there are dots', () => {
    const canvas = new BrailleCanvas(3, 1);
    canvas.plot('A', [[0, 0]]);
    canvas.plot('B', [[4, 0]]);
    expect(canvas.render()).toBe(`A⠁${BLANK}${RESET}B⠁${RESET}`);
  });

  it('joins rows without a newline', () => {
    const canvas = new BrailleCanvas(1, 2);
    canvas.plot('A', [[0, 0]]);
    canvas.plot('B', [[0, 4]]);
    expect(canvas.render()).toBe(`A⠁${RESET}\r\x1b[BB⠁${RESET}`);
  });

  it('lets the last ink win in a shared cell', () => {
    const canvas = new BrailleCanvas(1, 1);
    canvas.plot('A', [[0, 0]]);
    canvas.plot('B', [[1, 0]]);
    expect(canvas.render()).toBe(`B⠉${RESET}`);
  });

  it('reports and applies a resize', () => {
    const canvas = new BrailleCanvas(4, 2);
    canvas.plot('A', [[0, 0]]);
    expect(canvas.resize(4, 2)).toBe(false);
    expect(canvas.resize(6, 3)).toBe(true);
    expect(canvas.size).toEqual({ columns: 6, rows: 3 });
    expect(canvas.width).toBe(12);
    expect(canvas.height).toBe(12);
    expect(canvas.isBlank()).toBe(true);
  });

  it('never shrinks below one cell', () => {
    const canvas = new BrailleCanvas(0, -3);
    expect(canvas.size).toEqual({ columns: 1, rows: 1 });
  });
});

describe('rgbInk', () => {
  it('builds a 24-bit foreground sequence', () => {
    expect(rgbInk({ r: 255, g: 0.4, b: 127.6 })).toBe('\x1b[38;2;255;0;128m');
  });
});

describe('canvasSize', () => {
  it('keeps a spare column and row', () => {
    expect(canvasSize({ columns: 80, rows: 24 })).toEqual({ columns: 79, rows: 23 });
    expect(canvasSize({ columns: 1, rows: 0 })).toEqual({ columns: 1, rows: 1 });
  });
});
