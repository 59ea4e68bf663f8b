import { intensity } from '../engine/particles.js';
import { BrailleCanvas, DEFAULT_INK, rgbInk, type Ink } from './braille.js';
import { drawText } from './digits.js';
import type { CountdownState, Particle, Point, Rgb, ShowState } from '../types.js';

export const HOME = '\x1b[H';
export const CLEAR_SCREEN = '\x1b[2J';
export const CELEBRATION_INK = rgbInk({ r: 0, g: 255, b: 0 });

const INTENSITY_STEPS = 8;
const MIN_BRIGHTNESS = 0.35;
const TRAIL_BRIGHTNESS = 0.45;

// Quantised so neighbouring sparks share an ink and the frame needs fewer colour switches
export function dimmed(color: Rgb, level: number): Ink {
  const step = Math.ceil(Math.max(0, Math.min(1, level)) * INTENSITY_STEPS) / INTENSITY_STEPS;
  const k = MIN_BRIGHTNESS + (1 - MIN_BRIGHTNESS) * step;
  return rgbInk({ r: color.r * k, g: color.g * k, b: color.b * k });
}

function dot(x: number, y: number): [number, number] {
  return [x * 2, y * 4];
}

export function drawParticles(canvas: BrailleCanvas, particles: readonly Particle[]): void {
  for (const p of particles) {
    if (p.kind === 'rocket' && p.trail.length > 0) {
      const ink = dimmed(p.color, TRAIL_BRIGHTNESS);
      // Joined up to the head, a fast rocket moves several dots per frame
      const path: Point[] = [...p.trail, { x: p.x, y: p.y }];
      for (let i = 1; i < path.length; i++) {
        const [x0, y0] = dot(path[i - 1].x, path[i - 1].y);
        const [x1, y1] = dot(path[i].x, path[i].y);
        canvas.line(x0, y0, x1, y1, ink);
      }
    }
    canvas.plot(dimmed(p.color, intensity(p)), [dot(p.x, p.y)]);
  }
}

export function drawCountdown(canvas: BrailleCanvas, countdown: CountdownState): void {
  drawText(canvas, countdown.label, countdown.reached ? CELEBRATION_INK : DEFAULT_INK);
}

/**
 * Build one frame purely from the show state. The canvas is resized to the
 * state's grid first; a changed grid also clears the terminal so no glyphs
 * from the old size linger.
 */
export function drawFrame(canvas: BrailleCanvas, state: Pick<ShowState, 'grid' | 'particles' | 'countdown'>): string {
  const resized = canvas.resize(state.grid.columns, state.grid.rows);
  canvas.clear();
  drawParticles(canvas, state.particles);
  drawCountdown(canvas, state.countdown);
  return (resized ? CLEAR_SCREEN : '') + HOME + canvas.render();
}
