import { describe, it, expect, vi, afterEach } from 'vitest';
import { isAnimationError } from './errors';
import { lerpNumber, lerpVec3 } from './interpolate';
import { StepGroup, StepGroupBuilder } from './stepGroup';
import type { Vec3 } from '../types';

describe('anim/stepGroup', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('fans one shared t out to every action in registration order', () => {
    const calls: Array<[number, number]> = [];
    const group = new StepGroupBuilder(200)
      .custom((t) => calls.push([0, t]))
      .custom((t) => calls.push([1, t]))
      .custom((t) => calls.push([2, t]))
      .build();

    expect(group).toBeInstanceOf(StepGroup);
    expect(group.size).toBe(3);

    group.arm(1000);
    group.tick(1050);
    group.tick(1100);
    group.tick(1200);

    expect(calls).toEqual([
      [0, 0.25],
      [1, 0.25],
      [2, 0.25],
      [0, 0.5],
      [1, 0.5],
      [2, 0.5],
      [0, 1],
      [1, 1],
      [2, 1],
    ]);
  });

  it('moves several values together, each with its own easing', () => {
    let opacity = 0;
    let pos: Vec3 = { x: 0, y: 0, z: 0 };
    const group = new StepGroupBuilder(100)
      .tween({
        from: 0,
        to: 1,
        lerp: lerpNumber,
        apply: (v) => {
          opacity = v;
        },
      })
      .tween({
        from: { x: 0, y: 0, z: 0 },
        to: { x: 10, y: 20, z: 0 },
        lerp: lerpVec3,
        apply: (v) => {
          pos = v;
        },
        easing: 'easeInQuad',
      })
      .build();

    group.arm(0);
    expect(group.tick(50)).toBe(false);
    expect(opacity).toBe(0.5);
    expect(pos).toEqual({ x: 2.5, y: 5, z: 0 });

    expect(group.tick(100)).toBe(true);
    expect(opacity).toBe(1);
    expect(pos).toEqual({ x: 10, y: 20, z: 0 });
  });

  it('eases custom actions only when asked to', () => {
    const seen: number[] = [];
    const group = new StepGroupBuilder(100)
      .custom((t) => seen.push(t))
      .custom((t) => seen.push(t), 'easeInQuad')
      .build();
    group.arm(0);
    group.tick(50);
    expect(seen).toEqual([0.5, 0.25]);
  });

  it('rejects registration after build and returns the same group', () => {
    const builder = new StepGroupBuilder(100).custom(() => {});
    const group = builder.build();

    expect(builder.sealed).toBe(true);
    expect(builder.build()).toBe(group);

    let caught: unknown;
    try {
      builder.custom(() => {});
    } catch (err) {
      caught = err;
    }
    expect(isAnimationError(caught, 'SEALED')).toBe(true);
    expect(group.size).toBe(1);
  });

  it('warns when built empty', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const group = new StepGroupBuilder(100).build();
    expect(group.size).toBe(0);
    expect(warn).toHaveBeenCalledWith(
      'StepGroupBuilder.build(): group has no actions; it will only wait'
    );
  });

  it('requires a positive duration', () => {
    expect(() => new StepGroupBuilder(0)).toThrow(/duration must be > 0/);
  });
});
