import { describe, it, expect, vi, afterEach } from 'vitest';
import { createManualClock, createTimerScheduler, systemClock } from './clock';
import { AnimationError } from './errors';

describe('anim/clock', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('manual clock fires frames queued before advance, with the new time', () => {
    const clock = createManualClock(100);
    const seen: number[] = [];

    clock.requestFrame(() => {
      seen.push(clock.now());
      // queued for the next advance, not this one
      clock.requestFrame(() => seen.push(clock.now()));
    });
    expect(clock.pending()).toBe(1);

    clock.advance(16);
    expect(seen).toEqual([116]);
    expect(clock.pending()).toBe(1);

    clock.advance(16);
    expect(seen).toEqual([116, 132]);
    expect(clock.pending()).toBe(0);
  });

  it('skips cancelled frames', () => {
    const clock = createManualClock();
    const cb = vi.fn();
    clock.requestFrame(cb).cancel();
    expect(clock.pending()).toBe(0);
    clock.advance(10);
    expect(cb).not.toHaveBeenCalled();
  });

  it('rejects time going backwards', () => {
    const clock = createManualClock();
    expect(() => clock.advance(-1)).toThrow(AnimationError);
    clock.set(50);
    expect(clock.now()).toBe(50);
  });

  it('timer scheduler runs callbacks after the interval', () => {
    vi.useFakeTimers();
    const scheduler = createTimerScheduler(20);
    const cb = vi.fn();
    const cancelled = vi.fn();

    scheduler.requestFrame(cb);
    scheduler.requestFrame(cancelled).cancel();

    vi.advanceTimersByTime(19);
    expect(cb).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(cb).toHaveBeenCalledTimes(1);
    expect(cancelled).not.toHaveBeenCalled();
  });

  it('system clock is monotonic', () => {
    const a = systemClock.now();
    const b = systemClock.now();
    expect(b).toBeGreaterThanOrEqual(a);
  });
});
