import { CONFIG, WILLOW_GOLD, type PhysicsConfig } from '../config.js';
import { uniform, type Random } from './random.js';
import type { GridSize, LaunchEvent, Particle, Rocket, ShowEvent, Spark } from '../types.js';

export const DEFAULT_PHYSICS: PhysicsConfig = CONFIG;

export function intensity(p: Particle): number {
  return p.maxLife > 0 ? Math.max(0, Math.min(1, p.life / p.maxLife)) : 0;
}

function insideGrid(p: Particle, grid: GridSize): boolean {
  return p.x >= 0 && p.x < grid.columns && p.y >= 0 && p.y < grid.rows;
}

/**
 * Launch a rocket from the bottom row. The upward speed is solved from the
 * apex height so the burst lands in the upper part of the sky whatever the
 * terminal size.
 */
export function launchRocket(
  launch: LaunchEvent,
  grid: GridSize,
  rng: Random,
  physics: PhysicsConfig = DEFAULT_PHYSICS,
): Rocket {
  const x = launch.lane * grid.columns;
  const y = Math.max(0, grid.rows - 0.5);
  const apexY = grid.rows * uniform(rng, physics.ROCKET_APEX_MIN, physics.ROCKET_APEX_MAX);
  const rise = Math.max(0, y - apexY);
  const vy = -Math.sqrt(2 * physics.ROCKET_GRAVITY * rise);
  const timeToApex = -vy / physics.ROCKET_GRAVITY;

  return {
    kind: 'rocket',
    x,
    y,
    vx: uniform(rng, -physics.ROCKET_DRIFT, physics.ROCKET_DRIFT),
    vy,
    life: timeToApex + 0.5,
    maxLife: timeToApex + 0.5,
    color: { ...launch.color },
    burst: { pattern: launch.pattern, count: launch.count },
    trail: [],
  };
}

export function explode(rocket: Rocket, rng: Random, physics: PhysicsConfig = DEFAULT_PHYSICS): Spark[] {
  const { pattern, count } = rocket.burst;
  const willow = pattern === 'willow';
  const speed = uniform(rng, physics.SPARK_SPEED_MIN, physics.SPARK_SPEED_MAX) * (willow ? 0.6 : 1);
  const sparks: Spark[] = [];

  for (let i = 0; i < count; i++) {
    let angle: number;
    let radial: number;
    if (pattern === 'ring') {
      angle = (i / count) * 2 * Math.PI + uniform(rng, -0.02, 0.02);
      radial = 1;
    } else {
      // Projection of a sphere: denser towards the centre
      angle = rng() * 2 * Math.PI;
      radial = Math.sin(rng() * Math.PI);
    }

    const life = willow
      ? uniform(rng, physics.WILLOW_LIFE_MIN_S, physics.WILLOW_LIFE_MAX_S)
      : uniform(rng, physics.SPARK_LIFE_MIN_S, physics.SPARK_LIFE_MAX_S);

    sparks.push({
      kind: 'spark',
      x: rocket.x,
      y: rocket.y,
      vx: speed * radial * Math.cos(angle),
      vy: (speed * radial * Math.sin(angle)) / physics.CELL_ASPECT,
      life,
      maxLife: life,
      color: willow ? { ...WILLOW_GOLD } : { ...rocket.color },
      gravity: willow ? physics.WILLOW_GRAVITY : physics.SPARK_GRAVITY,
      drag: willow ? physics.WILLOW_DRAG_PER_S : physics.SPARK_DRAG_PER_S,
    });
  }
  return sparks;
}

/**
 * Advance every particle by dt seconds. Rockets that reach their apex (or run
 * out of fuel) are replaced by their burst; expired and off-grid particles
 * are dropped.
 */
export function stepParticles(
  particles: readonly Particle[],
  dt: number,
  grid: GridSize,
  rng: Random,
  physics: PhysicsConfig = DEFAULT_PHYSICS,
): { particles: Particle[]; events: ShowEvent[] } {
  const next: Particle[] = [];
  const events: ShowEvent[] = [];

  for (const p of particles) {
    if (p.kind === 'rocket') {
      p.trail.push({ x: p.x, y: p.y });
      if (p.trail.length > physics.ROCKET_TRAIL_LENGTH) p.trail.shift();

      p.vy += physics.ROCKET_GRAVITY * dt;
      p.x += p.vx * dt;
      p.y += p.vy * dt;
      p.life -= dt;

      if (!insideGrid(p, grid)) continue;
      if (p.vy >= 0 || p.life <= 0) {
        events.push({ type: 'explode', x: p.x, y: p.y, pattern: p.burst.pattern });
        for (const spark of explode(p, rng, physics)) next.push(spark);
        continue;
      }
      next.push(p);
    } else {
      const keep = Math.pow(p.drag, dt);
      p.vy += p.gravity * dt;
      p.vx *= keep;
      p.vy *= keep;
      p.x += p.vx * dt;
      p.y += p.vy * dt;
      p.life -= dt;

      if (p.life <= 0 || !insideGrid(p, grid)) continue;
      next.push(p);
    }
  }

  return { particles: next, events };
}
