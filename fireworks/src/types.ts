export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface GridSize {
  columns: number;
  rows: number;
}

export type BurstPattern = 'peony' | 'ring' | 'willow';

export interface Burst {
  pattern: BurstPattern;
  count: number;        // sparks produced
}

interface ParticleBase {
  x: number;            // cell units, 0 = left edge
  y: number;            // cell units, 0 = top edge
  vx: number;           // cells per second
  vy: number;
  life: number;         // seconds left
  maxLife: number;
  color: Rgb;
}

export interface Rocket extends ParticleBase {
  kind: 'rocket';
  burst: Burst;
  trail: Point[];       // oldest first
}

export interface Spark extends ParticleBase {
  kind: 'spark';
  gravity: number;
  drag: number;         // fraction of velocity kept per second
}

export type Particle = Rocket | Spark;

export interface LaunchEvent {
  readonly at: number;        // seconds after the show starts
  readonly count: number;
  readonly pattern: BurstPattern;
  readonly lane: number;      // 0-1 across the width
  readonly color: Readonly<Rgb>;
}

export type ShowTimeline = readonly LaunchEvent[];

export type CountdownMode = 'midnight' | 'new-year';

export interface WallDate {
  year: number;
  month: number;        // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export type CountdownTarget =
  | { kind: 'wall'; date: WallDate }
  | { kind: 'instant'; at: number };

export interface CountdownState {
  now: Date;
  target: Date;
  remainingMs: number;
  reached: boolean;
  label: string;
  timeZone: string | null;    // null = host-local Date arithmetic
}

export type ShowPhase = 'waiting' | 'show' | 'finished';

export type FinishReason = 'complete' | 'quit';

export type KeySignal = 'skip' | 'quit';

export type AudioCue = 'launch' | 'explode';

export interface ShowEvent {
  type: AudioCue;
  x: number;
  y: number;
  pattern: BurstPattern;
}

export interface ShowState {
  phase: ShowPhase;
  mode: CountdownMode;
  target: CountdownTarget;
  timeZone: string | null;
  countdown: CountdownState;
  timeline: ShowTimeline;
  nextLaunch: number;         // index into timeline
  showElapsed: number;        // seconds since entering 'show'
  particles: Particle[];
  grid: GridSize;
  frame: number;
  finishReason: FinishReason | null;
}
