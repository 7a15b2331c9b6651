import type { ProgressAction } from '../types';
import { resolveEasing, type EasingInput } from './easing';
import { AnimationError } from './errors';
import { durationPolicy, validatePolicy } from './progress';
import { TimedStep, trackAction, type ValueTrack } from './steps';

/**
 * A duration-governed step whose actions all share one progress value:
 * they start and finish together.
 */
export class StepGroup extends TimedStep {
  get size(): number {
    return this.actionCount;
  }
}

/**
 * Collects simultaneous tracks for a StepGroup.
 *
 * Registration order is the order actions run within a tick. `build()` seals
 * the builder; any later registration throws.
 */
export class StepGroupBuilder {
  readonly duration: number;
  private readonly actions: ProgressAction[] = [];
  private group: StepGroup | null = null;

  constructor(duration: number) {
    validatePolicy('StepGroupBuilder', durationPolicy(duration));
    this.duration = duration;
  }

  get sealed(): boolean {
    return this.group !== null;
  }

  /** Interpolate a value with its own easing. */
  tween<T>(track: ValueTrack<T>): this {
    this.assertOpen('tween');
    this.actions.push(trackAction(track));
    return this;
  }

  /**
   * Raw progress callback. It receives the linear, direction-adjusted `t`
   * unless an easing is given.
   */
  custom(action: ProgressAction, easing?: EasingInput): this {
    this.assertOpen('custom');
    if (easing === undefined) {
      this.actions.push(action);
    } else {
      const ease = resolveEasing(easing);
      this.actions.push((t) => action(ease(t)));
    }
    return this;
  }

  build(): StepGroup {
    if (this.group) return this.group;
    if (this.actions.length === 0) {
      console.warn(
        'StepGroupBuilder.build(): group has no actions; it will only wait'
      );
    }
    this.group = new StepGroup(durationPolicy(this.duration), this.actions);
    return this.group;
  }

  private assertOpen(method: string) {
    if (this.group) {
      throw new AnimationError(
        'SEALED',
        `StepGroupBuilder.${method}(): group is sealed; create a new builder`
      );
    }
  }
}
