import type { ProgramState, RunMode } from '../types';
import {
  createTimerScheduler,
  systemClock,
  type CancelHandle,
  type Clock,
  type FrameScheduler,
} from './clock';
import { once, type Program } from './program';
import type { ValueAnimation } from './valueAnimation';

export type PlaybackOptions = {
  mode?: RunMode;
  /** Defaults to `systemClock`. */
  clock?: Clock;
  /** Defaults to a 16ms timer scheduler. */
  scheduler?: FrameScheduler;
};

export interface PlaybackController {
  readonly program: Program;
  /** Resolves with the end state; rejects if a step throws. */
  readonly done: Promise<ProgramState>;
  stop(): void;
  isPlaying(): boolean;
}

type FrameLoop = {
  done: Promise<void>;
  cancel(): void;
  isActive(): boolean;
};

/**
 * Drain a push-mode generator one scheduled frame at a time. The first frame
 * runs synchronously so start-up errors throw to the caller.
 */
function runFrames(
  frames: Iterator<unknown, void, void>,
  scheduler: FrameScheduler
): FrameLoop {
  let pending: CancelHandle | null = null;
  let active = true;
  let settle: { resolve(): void; reject(err: unknown): void } | null = null;
  const done = new Promise<void>((resolve, reject) => {
    settle = { resolve, reject };
  });

  const end = (err?: unknown) => {
    if (!active) return;
    active = false;
    pending?.cancel();
    pending = null;
    if (err === undefined) settle?.resolve();
    else settle?.reject(err);
  };

  const step = () => {
    pending = null;
    if (!active) return;
    let result: IteratorResult<unknown, void>;
    try {
      result = frames.next();
    } catch (err) {
      end(err);
      return;
    }
    if (result.done) end();
    else pending = scheduler.requestFrame(step);
  };

  const first = frames.next();
  if (first.done) end();
  else pending = scheduler.requestFrame(step);

  return {
    done,
    cancel: () => end(),
    isActive: () => active,
  };
}

/**
 * Play a program on a frame scheduler and expose completion as a promise.
 */
export function playProgram(
  program: Program,
  opts: PlaybackOptions = {}
): PlaybackController {
  const clock = opts.clock ?? systemClock;
  const scheduler = opts.scheduler ?? createTimerScheduler();
  const mode = opts.mode ?? once();

  const loop = runFrames(program.frames(clock, mode), scheduler);

  // A direct program.stop() ends playback without waiting for the next frame.
  const unsubscribe = program.onStateChange((state) => {
    if (state === 'stopped') loop.cancel();
  });

  const done = loop.done.then(
    () => {
      unsubscribe();
      return program.state;
    },
    (err: unknown) => {
      unsubscribe();
      program.stop();
      throw err;
    }
  );

  return {
    program,
    done,
    stop() {
      program.stop();
      loop.cancel();
    },
    isPlaying() {
      return loop.isActive() && program.isRunning;
    },
  };
}

export interface ValuePlaybackController<T> {
  readonly animation: ValueAnimation<T>;
  /** Resolves with the final value, or the last one seen when stopped. */
  readonly done: Promise<T>;
  stop(): void;
  isPlaying(): boolean;
}

/**
 * Play a value animation, handing every computed value to `onValue`.
 */
export function playValue<T>(
  animation: ValueAnimation<T>,
  onValue: (value: T) => void,
  opts: Omit<PlaybackOptions, 'mode'> = {}
): ValuePlaybackController<T> {
  const clock = opts.clock ?? systemClock;
  const scheduler = opts.scheduler ?? createTimerScheduler();

  function* emit(): Generator<void, void, void> {
    for (const value of animation.values(clock)) {
      onValue(value);
      yield;
    }
  }

  const loop = runFrames(emit(), scheduler);
  return {
    animation,
    done: loop.done.then(() => animation.currentValue),
    stop: () => loop.cancel(),
    isPlaying: () => loop.isActive(),
  };
}
