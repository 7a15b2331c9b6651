import { AnimationError, assertFinite } from './errors';

/**
 * Time source. The runtime never reads a global clock; every `now` it sees
 * comes from a Clock or from the caller.
 */
export interface Clock {
  now(): number;
}

export interface CancelHandle {
  cancel(): void;
}

/** Host-supplied scheduling tick. */
export interface FrameScheduler {
  requestFrame(callback: () => void): CancelHandle;
}

export const DEFAULT_FRAME_INTERVAL_MS = 16;

/** Milliseconds from `performance.now()`. */
export const systemClock: Clock = {
  now: () => performance.now(),
};

export function createTimerScheduler(
  intervalMs: number = DEFAULT_FRAME_INTERVAL_MS
): FrameScheduler {
  assertFinite('createTimerScheduler()', 'intervalMs', intervalMs);
  const delay = Math.max(0, intervalMs);
  return {
    requestFrame(callback) {
      const id = setTimeout(callback, delay);
      return { cancel: () => clearTimeout(id) };
    },
  };
}

/**
 * Deterministic clock + scheduler for tests and offline rendering.
 * `advance(dt)` moves time, then fires the frames that were queued before it.
 */
export interface ManualClock extends Clock, FrameScheduler {
  set(time: number): void;
  advance(dt: number): void;
  pending(): number;
}

export function createManualClock(start = 0): ManualClock {
  assertFinite('createManualClock()', 'start', start);
  let time = start;
  let queue: Array<{ callback: () => void; cancelled: boolean }> = [];

  return {
    now: () => time,

    set(next) {
      assertFinite('ManualClock.set()', 'time', next);
      time = next;
    },

    advance(dt) {
      assertFinite('ManualClock.advance()', 'dt', dt);
      if (dt < 0) {
        throw new AnimationError(
          'INVALID_PARAMETER',
          `ManualClock.advance(): dt must be >= 0 (got ${dt})`
        );
      }
      time += dt;
      const due = queue;
      queue = [];
      for (const entry of due) {
        if (!entry.cancelled) entry.callback();
      }
    },

    pending() {
      return queue.filter((e) => !e.cancelled).length;
    },

    requestFrame(callback) {
      const entry = { callback, cancelled: false };
      queue.push(entry);
      return {
        cancel: () => {
          entry.cancelled = true;
        },
      };
    },
  };
}
