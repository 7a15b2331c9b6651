export type Vec3 = { x: number; y: number; z: number };

/** Color with float channels in [0, 1]. */
export type Rgba = { r: number; g: number; b: number; a: number };

/** Receives the (direction-adjusted) progress of a timed step once per tick. */
export type ProgressAction = (t: number) => void;

/** Condition polled by a predicate step; receives the tick time. */
export type TimePredicate = (now: number) => boolean;

/** Two-point interpolation. `t` is eased and may leave [0, 1]. */
export type Lerp<T> = (from: T, to: T, t: number) => T;

export type DistanceFn<T> = (from: T, to: T) => number;

export type TimingPolicy =
  | { kind: 'duration'; duration: number }
  | { kind: 'speed'; speed: number; distance: number };

export type ProgressSample = {
  /** Clamped, direction-adjusted progress in [0, 1]. */
  t: number;
  finished: boolean;
};

export type RunMode =
  | { kind: 'once' }
  | { kind: 'loop'; count: number }
  | { kind: 'loopForever' };

export type ProgramState = 'idle' | 'running' | 'finished' | 'stopped';

export type ProgramStateListener = (state: ProgramState) => void;
