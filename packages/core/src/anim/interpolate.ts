import type { Rgba, Vec3 } from '../types';

/** Clamp into [0, 1]. NaN maps to 0; infinities clamp like any other value. */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

// Interpolators are unclamped: eased progress may overshoot on purpose.

export function lerpNumber(from: number, to: number, t: number): number {
  return from + (to - from) * t;
}

export function lerpVec3(from: Vec3, to: Vec3, t: number): Vec3 {
  return {
    x: lerpNumber(from.x, to.x, t),
    y: lerpNumber(from.y, to.y, t),
    z: lerpNumber(from.z, to.z, t),
  };
}

export function lerpColor(from: Rgba, to: Rgba, t: number): Rgba {
  return {
    r: lerpNumber(from.r, to.r, t),
    g: lerpNumber(from.g, to.g, t),
    b: lerpNumber(from.b, to.b, t),
    a: lerpNumber(from.a, to.a, t),
  };
}

export function numberDistance(from: number, to: number): number {
  return Math.abs(to - from);
}

/** Euclidean distance. */
export function vec3Distance(from: Vec3, to: Vec3): number {
  return Math.hypot(to.x - from.x, to.y - from.y, to.z - from.z);
}

/** Manhattan (L1) distance over all four channels. */
export function colorDistance(from: Rgba, to: Rgba): number {
  return (
    Math.abs(to.r - from.r) +
    Math.abs(to.g - from.g) +
    Math.abs(to.b - from.b) +
    Math.abs(to.a - from.a)
  );
}

export function withAlpha(color: Rgba, a: number): Rgba {
  return { r: color.r, g: color.g, b: color.b, a };
}
