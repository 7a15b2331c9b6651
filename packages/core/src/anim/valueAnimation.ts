import type { DistanceFn, Lerp, Rgba, TimingPolicy, Vec3 } from '../types';
import type { Clock } from './clock';
import { resolveEasing, type EasingInput } from './easing';
import {
  colorDistance,
  lerpColor,
  lerpNumber,
  lerpVec3,
  numberDistance,
  vec3Distance,
} from './interpolate';
import { durationPolicy, ProgressSource, speedPolicy } from './progress';

export type ValueTiming = { duration: number } | { speed: number };

export type ValueAnimationOptions = {
  easing?: EasingInput;
  reversed?: boolean;
};

/**
 * Pull-driven animation of a single value.
 *
 * ```ts
 * const anim = animateNumber(0, 100, { duration: 500 });
 * anim.arm(clock.now());
 * // every frame:
 * const { value, active } = anim.computeAndAdvance(clock.now());
 * ```
 */
export class ValueAnimation<T> {
  private readonly progress: ProgressSource;
  private readonly lerp: (t: number) => T;
  private value: T;
  private finished = false;

  constructor(
    policy: TimingPolicy,
    lerp: (t: number) => T,
    options: { reversed?: boolean } = {}
  ) {
    this.progress = new ProgressSource(policy, options);
    this.lerp = lerp;
    this.value = lerp(this.progress.isReversed ? 1 : 0);
  }

  /** Last computed value. */
  get currentValue(): T {
    return this.value;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  get isReversed(): boolean {
    return this.progress.isReversed;
  }

  arm(now: number): void {
    this.progress.arm(now);
    this.finished = false;
  }

  /** Recompute `currentValue`. Returns true once the animation has finished. */
  advance(now: number): boolean {
    const { t, finished } = this.progress.advance(now);
    this.value = this.lerp(t);
    this.finished = finished;
    return finished;
  }

  /** The end frame itself returns the end value with `active: false`. */
  computeAndAdvance(now: number): { value: T; active: boolean } {
    const finished = this.advance(now);
    return { value: this.value, active: !finished };
  }

  /** Flip direction. Call `arm()` again before resuming. */
  reverse(): void {
    this.progress.reverse();
    this.finished = false;
  }

  /** Push mode: arms, then yields one value per pull until finished. */
  *values(clock: Clock): Generator<T, void, void> {
    this.arm(clock.now());
    for (;;) {
      const finished = this.advance(clock.now());
      yield this.value;
      if (finished) return;
    }
  }
}

function createValueAnimation<T>(
  from: T,
  to: T,
  timing: ValueTiming,
  lerp: Lerp<T>,
  distance: DistanceFn<T>,
  options: ValueAnimationOptions
): ValueAnimation<T> {
  const policy =
    'duration' in timing
      ? durationPolicy(timing.duration)
      : speedPolicy(timing.speed, distance(from, to));
  const ease = resolveEasing(options.easing);
  return new ValueAnimation(policy, (t) => lerp(from, to, ease(t)), {
    reversed: options.reversed,
  });
}

/** Speed timing uses the absolute difference as distance. */
export function animateNumber(
  from: number,
  to: number,
  timing: ValueTiming,
  options: ValueAnimationOptions = {}
): ValueAnimation<number> {
  return createValueAnimation(
    from,
    to,
    timing,
    lerpNumber,
    numberDistance,
    options
  );
}

/** Speed timing uses the Euclidean distance. */
export function animateVec3(
  from: Vec3,
  to: Vec3,
  timing: ValueTiming,
  options: ValueAnimationOptions = {}
): ValueAnimation<Vec3> {
  return createValueAnimation(from, to, timing, lerpVec3, vec3Distance, options);
}

/** Speed timing uses the Manhattan distance over r, g, b, a. */
export function animateColor(
  from: Rgba,
  to: Rgba,
  timing: ValueTiming,
  options: ValueAnimationOptions = {}
): ValueAnimation<Rgba> {
  return createValueAnimation(
    from,
    to,
    timing,
    lerpColor,
    colorDistance,
    options
  );
}
