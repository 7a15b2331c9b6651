import type { ProgressSample, TimingPolicy } from '../types';
import type { Clock } from './clock';
import { AnimationError, assertFinite } from './errors';
import { clamp01 } from './interpolate';

export type ProgressOptions = {
  /** Start playing from 1 towards 0. */
  reversed?: boolean;
};

export function durationPolicy(duration: number): TimingPolicy {
  return { kind: 'duration', duration };
}

export function speedPolicy(speed: number, distance: number): TimingPolicy {
  return { kind: 'speed', speed, distance };
}

export function validatePolicy(owner: string, policy: TimingPolicy): void {
  switch (policy.kind) {
    case 'duration':
      assertFinite(owner, 'duration', policy.duration);
      if (policy.duration <= 0) {
        throw new AnimationError(
          'INVALID_PARAMETER',
          `${owner}: duration must be > 0 (got ${policy.duration})`
        );
      }
      return;
    case 'speed':
      assertFinite(owner, 'speed', policy.speed);
      assertFinite(owner, 'distance', policy.distance);
      if (policy.speed <= 0) {
        throw new AnimationError(
          'INVALID_PARAMETER',
          `${owner}: speed must be > 0 (got ${policy.speed})`
        );
      }
      if (policy.distance < 0) {
        throw new AnimationError(
          'INVALID_PARAMETER',
          `${owner}: distance must be >= 0 (got ${policy.distance})`
        );
      }
      return;
    default: {
      const unknown: never = policy;
      throw new AnimationError(
        'INVALID_PARAMETER',
        `${owner}: unknown timing policy ${JSON.stringify(unknown)}`
      );
    }
  }
}

/**
 * Unclamped progress for an elapsed time. A zero-distance speed policy is
 * complete from the start (Infinity, never NaN).
 */
export function rawProgress(policy: TimingPolicy, elapsed: number): number {
  if (policy.kind === 'duration') return elapsed / policy.duration;
  if (policy.distance === 0) return Number.POSITIVE_INFINITY;
  return (elapsed * policy.speed) / policy.distance;
}

/**
 * Normalized progress under a duration or speed policy.
 *
 * Pull mode: `arm(now)` once, then `advance(now)` every frame. The frame that
 * first reaches t = 1 already reports `finished`.
 *
 * `reverse()` flips direction and disarms the source; it must be armed again
 * before the next `advance`.
 */
export class ProgressSource {
  readonly policy: TimingPolicy;
  private reversed: boolean;
  private startTime = 0;
  private armed = false;

  constructor(policy: TimingPolicy, options: ProgressOptions = {}) {
    validatePolicy('ProgressSource', policy);
    this.policy = policy;
    this.reversed = options.reversed ?? false;
  }

  get isArmed(): boolean {
    return this.armed;
  }

  get isReversed(): boolean {
    return this.reversed;
  }

  arm(now: number): void {
    assertFinite('ProgressSource.arm()', 'now', now);
    this.startTime = now;
    this.armed = true;
  }

  advance(now: number): ProgressSample {
    if (!this.armed) {
      throw new AnimationError(
        'NOT_ARMED',
        'ProgressSource.advance(): call arm() first (reverse() disarms the source)'
      );
    }
    assertFinite('ProgressSource.advance()', 'now', now);
    return this.sampleAt(now - this.startTime);
  }

  /** Progress after `elapsed` time units; does not touch the armed state. */
  sampleAt(elapsed: number): ProgressSample {
    const raw = rawProgress(this.policy, elapsed);
    const t = clamp01(raw);
    return {
      t: this.reversed ? 1 - t : t,
      finished: raw >= 1,
    };
  }

  reverse(): void {
    this.reversed = !this.reversed;
    this.armed = false;
  }

  /**
   * Push mode: arms at `clock.now()` and yields one `t` per pull, ending after
   * the sample that completes the timeline. Calling again re-arms.
   */
  *samples(clock: Clock): Generator<number, void, void> {
    this.arm(clock.now());
    for (;;) {
      const sample = this.advance(clock.now());
      yield sample.t;
      if (sample.finished) return;
    }
  }
}
