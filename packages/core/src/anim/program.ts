import type { ProgramState, ProgramStateListener, RunMode } from '../types';
import type { Clock } from './clock';
import { AnimationError, assertFinite } from './errors';
import { describeStep, driveFrames, type Step } from './steps';

export function once(): RunMode {
  return { kind: 'once' };
}

export function loop(count: number): RunMode {
  return { kind: 'loop', count };
}

export function loopForever(): RunMode {
  return { kind: 'loopForever' };
}

function validateMode(mode: RunMode) {
  if (mode.kind !== 'loop') return;
  if (!Number.isInteger(mode.count) || mode.count < 1) {
    throw new AnimationError(
      'INVALID_PARAMETER',
      `Program.start(): loop count must be an integer >= 1 (got ${mode.count})`
    );
  }
}

/**
 * An ordered, single-use run of steps.
 *
 * idle -> running -> finished | stopped. Both end states are terminal: a
 * finished or stopped program releases its steps and cannot start again.
 *
 * A step that finishes hands over to the next one, which is armed in the same
 * tick but first ticked on the following one, so no two steps ever act within
 * a single tick.
 */
export class Program {
  private steps: readonly Step[];
  private readonly listeners = new Set<ProgramStateListener>();
  private _state: ProgramState = 'idle';
  private mode: RunMode = once();
  private index = 0;
  private passes = 0;

  constructor(steps: readonly Step[]) {
    this.steps = Object.freeze([...steps]);
  }

  get state(): ProgramState {
    return this._state;
  }

  get isRunning(): boolean {
    return this._state === 'running';
  }

  get stepCount(): number {
    return this.steps.length;
  }

  get currentStepIndex(): number {
    return this.index;
  }

  /** Full passes over the step list completed so far. */
  get completedPasses(): number {
    return this.passes;
  }

  describe(): string[] {
    return this.steps.map(describeStep);
  }

  onStateChange(listener: ProgramStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(now: number, mode: RunMode = once()): void {
    if (this._state === 'running') {
      throw new AnimationError(
        'ALREADY_RUNNING',
        'Program.start(): program is already running'
      );
    }
    if (this._state !== 'idle') {
      throw new AnimationError(
        'INVALID_STATE',
        `Program.start(): program is ${this._state}; build a new one to run again`
      );
    }
    const first = this.steps[0];
    if (!first) {
      throw new AnimationError(
        'EMPTY_PROGRAM',
        'Program.start(): program has no steps'
      );
    }
    validateMode(mode);

    this.mode = mode;
    this.index = 0;
    this.passes = 0;
    first.arm(now);
    this.setState('running');
  }

  /** Advance by one scheduling tick. Returns true once the program has ended. */
  tick(now: number): boolean {
    if (this._state === 'idle') {
      throw new AnimationError(
        'INVALID_STATE',
        'Program.tick(): call start() first'
      );
    }
    if (this._state !== 'running') return true;
    assertFinite('Program.tick()', 'now', now);

    const step = this.steps[this.index];
    if (!step) return true;
    const stepDone = step.tick(now);
    // An action may have stopped us mid-tick.
    if (this._state !== 'running') return true;
    if (!stepDone) return false;

    this.index += 1;
    if (this.index >= this.steps.length) {
      this.passes += 1;
      if (this.isLastPass()) {
        this.finish('finished');
        return true;
      }
      this.index = 0;
    }
    this.steps[this.index]?.arm(now);
    return false;
  }

  /** Stop from any non-terminal state. Idempotent. */
  stop(): void {
    if (this._state === 'finished' || this._state === 'stopped') return;
    this.finish('stopped');
  }

  /**
   * Push mode: starts on the first pull, then one tick per pull until the
   * program ends.
   */
  frames(clock: Clock, mode: RunMode = once()): Generator<void, void, void> {
    return driveFrames(
      {
        arm: (now) => this.start(now, mode),
        tick: (now) => this.tick(now),
      },
      clock
    );
  }

  private isLastPass(): boolean {
    switch (this.mode.kind) {
      case 'once':
        return true;
      case 'loop':
        return this.passes >= this.mode.count;
      case 'loopForever':
        return false;
    }
  }

  private finish(state: 'finished' | 'stopped') {
    this.steps = Object.freeze([]);
    this.setState(state);
    this.listeners.clear();
  }

  private setState(state: ProgramState) {
    this._state = state;
    for (const listener of [...this.listeners]) listener(state);
  }
}
