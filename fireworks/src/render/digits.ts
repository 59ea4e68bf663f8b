// Seven-segment countdown digits drawn in braille dots.
//
//    aaaaaaaaaaa
//    f         b
//    f         b
//    ggggggggggg
//    e         c
//    e         c
//    ddddddddddd

import { BrailleCanvas, type Ink } from './braille.js';

export const DIGIT_WIDTH = 11;
export const DIGIT_HEIGHT = 22;
export const COLON_WIDTH = 4;
export const GLYPH_SPACING = 3;

type Segment = 'a' | 'b' | 'c' | 'd' | 'e' | 'f' | 'g';

// [x0, y0, x1, y1] inclusive, in dots
const SEGMENT_RECTS: Record<Segment, [number, number, number, number]> = {
  a: [0, 0, 10, 1],
  b: [9, 0, 10, 11],
  c: [9, 10, 10, 21],
  d: [0, 20, 10, 21],
  e: [0, 10, 1, 21],
  f: [0, 0, 1, 11],
  g: [0, 10, 10, 11],
};

const DIGIT_SEGMENTS: Record<string, Segment[]> = {
  '0': ['a', 'b', 'c', 'd', 'e', 'f'],
  '1': ['b', 'c'],
  '2': ['a', 'b', 'g', 'e', 'd'],
  '3': ['a', 'b', 'g', 'c', 'd'],
  '4': ['f', 'g', 'b', 'c'],
  '5': ['a', 'f', 'g', 'c', 'd'],
  '6': ['a', 'f', 'g', 'e', 'c', 'd'],
  '7': ['a', 'b', 'c'],
  '8': ['a', 'b', 'c', 'd', 'e', 'f', 'g'],
  '9': ['a', 'b', 'c', 'd', 'f', 'g'],
};

interface Glyph {
  width: number;
  points: [number, number][];
}

const glyphCache = new Map<string, Glyph | null>();

function rectPoints([x0, y0, x1, y1]: [number, number, number, number], into: Set<string>): void {
  for (let y = y0; y <= y1; y++) {
    for (let x = x0; x <= x1; x++) into.add(`${x},${y}`);
  }
}

export function glyphFor(char: string): Glyph | null {
  const cached = glyphCache.get(char);
  if (cached !== undefined) return cached;

  let glyph: Glyph | null = null;
  const dots = new Set<string>();
  const segments = DIGIT_SEGMENTS[char];
  if (segments) {
    for (const s of segments) rectPoints(SEGMENT_RECTS[s], dots);
    glyph = { width: DIGIT_WIDTH, points: [] };
  } else if (char === ':') {
    rectPoints([1, 5, 2, 6], dots);
    rectPoints([1, 13, 2, 14], dots);
    glyph = { width: COLON_WIDTH, points: [] };
  }

  if (glyph) {
    for (const key of dots) {
      const [x, y] = key.split(',').map(Number);
      glyph.points.push([x, y]);
    }
  }
  glyphCache.set(char, glyph);
  return glyph;
}

/** Width in dots, including the spacing after every glyph. */
export function textWidth(text: string): number {
  let total = 0;
  for (const char of text) {
    const glyph = glyphFor(char);
    if (glyph) total += glyph.width + GLYPH_SPACING;
  }
  return total;
}

/** Draw text centred on the canvas. Characters without a glyph are skipped. */
export function drawText(canvas: BrailleCanvas, text: string, ink: Ink): void {
  const total = textWidth(text);
  if (total === 0) return;

  let x = Math.floor((canvas.width - total) / 2);
  const y = Math.floor((canvas.height - DIGIT_HEIGHT) / 2);

  for (const char of text) {
    const glyph = glyphFor(char);
    if (!glyph) continue;
    const originX = x;
    canvas.plot(ink, glyph.points.map(([gx, gy]): [number, number] => [originX + gx, y + gy]));
    x += glyph.width + GLYPH_SPACING;
  }
}
