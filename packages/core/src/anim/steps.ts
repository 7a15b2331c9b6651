import type {
  Lerp,
  ProgressAction,
  TimePredicate,
  TimingPolicy,
} from '../types';
import type { Clock } from './clock';
import { resolveEasing, type EasingInput } from './easing';
import { AnimationError, assertFinite } from './errors';
import { ProgressSource, type ProgressOptions } from './progress';

/**
 * Anything that can be driven one scheduling tick at a time.
 * `tick` returns true once finished.
 */
export interface Tickable {
  arm(now: number): void;
  tick(now: number): boolean;
}

/**
 * Push mode for any Tickable: arm on the first pull, then one tick per pull
 * until finished. Every step shares this one implementation.
 */
export function* driveFrames(
  target: Tickable,
  clock: Clock
): Generator<void, void, void> {
  target.arm(clock.now());
  while (!target.tick(clock.now())) {
    yield;
  }
}

/** A value animated from `from` to `to` and written out through `apply`. */
export type ValueTrack<T> = {
  from: T;
  to: T;
  lerp: Lerp<T>;
  apply: (value: T) => void;
  easing?: EasingInput;
};

export function trackAction<T>(track: ValueTrack<T>): ProgressAction {
  const ease = resolveEasing(track.easing);
  const { from, to, lerp, apply } = track;
  return (t) => apply(lerp(from, to, ease(t)));
}

export class TimedStep implements Tickable {
  readonly kind = 'timed' as const;
  protected readonly progress: ProgressSource;
  private readonly actions: readonly ProgressAction[];

  constructor(
    policy: TimingPolicy,
    actions: readonly ProgressAction[],
    options: ProgressOptions = {}
  ) {
    this.progress = new ProgressSource(policy, options);
    this.actions = Object.freeze([...actions]);
  }

  get policy(): TimingPolicy {
    return this.progress.policy;
  }

  get actionCount(): number {
    return this.actions.length;
  }

  arm(now: number): void {
    this.progress.arm(now);
  }

  tick(now: number): boolean {
    const { t, finished } = this.progress.advance(now);
    for (const action of this.actions) action(t);
    return finished;
  }

  /** Flips direction; the step must be armed again before the next tick. */
  reverse(): void {
    this.progress.reverse();
  }

  frames(clock: Clock): Generator<void, void, void> {
    return driveFrames(this, clock);
  }
}

export class DelayStep implements Tickable {
  readonly kind = 'delay' as const;
  readonly duration: number;
  private startTime: number | null = null;

  constructor(duration: number) {
    assertFinite('DelayStep', 'duration', duration);
    if (duration < 0) {
      throw new AnimationError(
        'INVALID_PARAMETER',
        `DelayStep: duration must be >= 0 (got ${duration})`
      );
    }
    this.duration = duration;
  }

  arm(now: number): void {
    assertFinite('DelayStep.arm()', 'now', now);
    this.startTime = now;
  }

  tick(now: number): boolean {
    if (this.startTime === null) {
      throw new AnimationError(
        'NOT_ARMED',
        'DelayStep.tick(): call arm() first'
      );
    }
    assertFinite('DelayStep.tick()', 'now', now);
    return now - this.startTime >= this.duration;
  }

  reverse(): void {}

  frames(clock: Clock): Generator<void, void, void> {
    return driveFrames(this, clock);
  }
}

export class PredicateStep implements Tickable {
  readonly kind = 'predicate' as const;
  private readonly predicate: TimePredicate;

  constructor(predicate: TimePredicate) {
    this.predicate = predicate;
  }

  // No baseline: the predicate is polled with absolute tick time.
  arm(): void {}

  tick(now: number): boolean {
    assertFinite('PredicateStep.tick()', 'now', now);
    return this.predicate(now);
  }

  reverse(): void {}

  frames(clock: Clock): Generator<void, void, void> {
    return driveFrames(this, clock);
  }
}

/** Fires its action on the first tick after arm, then reports finished. */
export class OneShotStep implements Tickable {
  readonly kind = 'oneShot' as const;
  private readonly action: () => void;
  private fired = false;

  constructor(action: () => void) {
    this.action = action;
  }

  arm(): void {
    this.fired = false;
  }

  tick(): boolean {
    if (!this.fired) {
      this.fired = true;
      this.action();
    }
    return true;
  }

  reverse(): void {}

  frames(clock: Clock): Generator<void, void, void> {
    return driveFrames(this, clock);
  }
}

export type Step = TimedStep | DelayStep | PredicateStep | OneShotStep;

export type StepKind = Step['kind'];

export function describeStep(step: Step): string {
  switch (step.kind) {
    case 'timed': {
      const p = step.policy;
      const timing =
        p.kind === 'duration'
          ? `duration=${p.duration}`
          : `speed=${p.speed}, distance=${p.distance}`;
      return `timed(${timing}, actions=${step.actionCount})`;
    }
    case 'delay':
      return `delay(${step.duration})`;
    case 'predicate':
      return 'waitUntil';
    case 'oneShot':
      return 'do';
    default: {
      const unknown: never = step;
      return String(unknown);
    }
  }
}
