import { AnimationError } from './errors';

/** Maps linear progress in [0, 1] to eased progress. Output may overshoot. */
export type EasingFunction = (t: number) => number;

export type EasingName =
  | 'linear'
  | 'easeInQuad'
  | 'easeOutQuad'
  | 'easeInOutQuad'
  | 'easeInCubic'
  | 'easeOutCubic'
  | 'easeInOutCubic'
  | 'easeInExpo'
  | 'easeOutExpo'
  | 'easeInOutExpo'
  | 'easeInBack'
  | 'easeOutBack'
  | 'easeInOutBack'
  | 'easeInBounce'
  | 'easeOutBounce';

export type EasingInput = EasingName | EasingFunction;

const BACK_OVERSHOOT = 1.70158;
const BACK_IN_OUT_OVERSHOOT = BACK_OVERSHOOT * 1.525;

function easeOutBounce(t: number): number {
  if (t < 1 / 2.75) return 7.5625 * t * t;
  if (t < 2 / 2.75) {
    const s = t - 1.5 / 2.75;
    return 7.5625 * s * s + 0.75;
  }
  if (t < 2.5 / 2.75) {
    const s = t - 2.25 / 2.75;
    return 7.5625 * s * s + 0.9375;
  }
  const s = t - 2.625 / 2.75;
  return 7.5625 * s * s + 0.984375;
}

export const easings: Readonly<Record<EasingName, EasingFunction>> =
  Object.freeze({
    linear: (t) => t,
    easeInQuad: (t) => t * t,
    easeOutQuad: (t) => 1 - (1 - t) * (1 - t),
    easeInOutQuad: (t) =>
      t < 0.5 ? 2 * t * t : 1 - Math.pow(-2 * t + 2, 2) / 2,
    easeInCubic: (t) => t * t * t,
    easeOutCubic: (t) => 1 - Math.pow(1 - t, 3),
    easeInOutCubic: (t) =>
      t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2,
    easeInExpo: (t) => (t === 0 ? 0 : Math.pow(2, 10 * (t - 1))),
    easeOutExpo: (t) => (t === 1 ? 1 : 1 - Math.pow(2, -10 * t)),
    easeInOutExpo: (t) => {
      if (t === 0 || t === 1) return t;
      return t < 0.5
        ? Math.pow(2, 20 * t - 10) / 2
        : (2 - Math.pow(2, -20 * t + 10)) / 2;
    },
    easeInBack: (t) => t * t * ((BACK_OVERSHOOT + 1) * t - BACK_OVERSHOOT),
    easeOutBack: (t) => {
      const s = t - 1;
      return s * s * ((BACK_OVERSHOOT + 1) * s + BACK_OVERSHOOT) + 1;
    },
    easeInOutBack: (t) => {
      const s = t * 2;
      if (s < 1) {
        return (
          (s * s * ((BACK_IN_OUT_OVERSHOOT + 1) * s - BACK_IN_OUT_OVERSHOOT)) /
          2
        );
      }
      const u = s - 2;
      return (
        (u * u * ((BACK_IN_OUT_OVERSHOOT + 1) * u + BACK_IN_OUT_OVERSHOOT) +
          2) /
        2
      );
    },
    easeInBounce: (t) => 1 - easeOutBounce(1 - t),
    easeOutBounce,
  });

function isEasingName(name: string): name is EasingName {
  return Object.prototype.hasOwnProperty.call(easings, name);
}

/**
 * Resolve an easing name or function. Custom functions are returned as-is so
 * overshooting curves keep their shape.
 */
export function resolveEasing(input?: EasingInput): EasingFunction {
  if (input === undefined) return easings.linear;
  if (typeof input === 'function') return input;
  if (!isEasingName(input)) {
    throw new AnimationError(
      'INVALID_PARAMETER',
      `resolveEasing(): unknown easing "${String(input)}"`
    );
  }
  return easings[input];
}
