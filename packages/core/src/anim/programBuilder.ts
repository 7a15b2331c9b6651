import type { Lerp, TimePredicate } from '../types';
import type { EasingInput } from './easing';
import { AnimationError } from './errors';
import { Program } from './program';
import { speedPolicy } from './progress';
import { StepGroupBuilder, type StepGroup } from './stepGroup';
import {
  DelayStep,
  OneShotStep,
  PredicateStep,
  TimedStep,
  trackAction,
  type Step,
  type ValueTrack,
} from './steps';

export type SpeedTiming = {
  /** Distance units per time unit. */
  speed: number;
  /** Distance between `from` and `to` under the value's own metric. */
  distance: number;
};

export type PathOptions<T> = {
  /** Starting point; not part of `points`. */
  from: T;
  points: readonly T[];
  /** One duration for every segment, or one per point. */
  durations: number | readonly number[];
  lerp: Lerp<T>;
  apply: (value: T) => void;
  /** Applied to each segment, not to the whole path. */
  easing?: EasingInput;
};

/**
 * Authoring API that compiles to an immutable `Program`.
 *
 * - Steps run in the order they are added.
 * - `build()` seals the builder; adding afterwards throws.
 */
export class ProgramBuilder {
  private steps: Step[] = [];
  private built: Program | null = null;

  /** Steps added so far. Zero once built: the program owns them. */
  get stepCount(): number {
    return this.steps.length;
  }

  /** Tween one value over a fixed duration. */
  tween<T>(track: ValueTrack<T>, duration: number): this {
    return this.group(duration, (g) => g.tween(track));
  }

  /** Tween one value at constant speed; duration follows from the distance. */
  tweenAtSpeed<T>(track: ValueTrack<T>, timing: SpeedTiming): this {
    return this.push(
      'tweenAtSpeed',
      new TimedStep(speedPolicy(timing.speed, timing.distance), [
        trackAction(track),
      ])
    );
  }

  /** Several tracks sharing one duration, played simultaneously. */
  group(duration: number, cb: (group: StepGroupBuilder) => unknown): this {
    this.assertOpen('group');
    const builder = new StepGroupBuilder(duration);
    cb(builder);
    return this.push('group', builder.build());
  }

  /** Append a prepared step. A group builder passed here is sealed. */
  step(step: Step | StepGroupBuilder): this {
    return this.push(
      'step',
      step instanceof StepGroupBuilder ? step.build() : step
    );
  }

  wait(duration: number): this {
    return this.push('wait', new DelayStep(duration));
  }

  waitUntil(predicate: TimePredicate): this {
    return this.push('waitUntil', new PredicateStep(predicate));
  }

  do(action: () => void): this {
    return this.push('do', new OneShotStep(action));
  }

  /**
   * Move through `points` one segment at a time, starting at `from`.
   *
   * ```
   * from ---durations[0]---> points[0] ---durations[1]---> points[1] ...
   * ```
   */
  path<T>(opts: PathOptions<T>): this {
    this.assertOpen('path');
    const { points, durations } = opts;

    if (typeof durations !== 'number' && durations.length !== points.length) {
      throw new AnimationError(
        'INVALID_PARAMETER',
        `ProgramBuilder.path(): got ${points.length} points but ${durations.length} durations`
      );
    }
    if (points.length === 0) {
      console.warn('ProgramBuilder.path(): empty path, no steps added');
      return this;
    }

    // Validate every segment before adding any of them.
    const groups: StepGroup[] = [];
    let current = opts.from;
    points.forEach((to, i) => {
      const duration =
        typeof durations === 'number' ? durations : (durations[i] ?? NaN);
      groups.push(
        new StepGroupBuilder(duration)
          .tween({
            from: current,
            to,
            lerp: opts.lerp,
            apply: opts.apply,
            easing: opts.easing,
          })
          .build()
      );
      current = to;
    });
    this.steps.push(...groups);
    return this;
  }

  build(): Program {
    if (!this.built) {
      this.built = new Program(this.steps);
      this.steps = [];
    }
    return this.built;
  }

  private push(method: string, step: Step): this {
    this.assertOpen(method);
    this.steps.push(step);
    return this;
  }

  private assertOpen(method: string) {
    if (this.built) {
      throw new AnimationError(
        'SEALED',
        `ProgramBuilder.${method}(): builder already built; create a new one`
      );
    }
  }
}

/** Convenience helper for one-off programs. */
export function buildProgram(cb: (program: ProgramBuilder) => unknown): Program {
  const builder = new ProgramBuilder();
  cb(builder);
  return builder.build();
}
