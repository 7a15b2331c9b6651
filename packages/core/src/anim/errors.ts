/**
 * Error codes for every usage violation raised by the animation runtime.
 */
export type AnimationErrorCode =
  | 'INVALID_PARAMETER'
  | 'NOT_ARMED'
  | 'INVALID_STATE'
  | 'ALREADY_RUNNING'
  | 'EMPTY_PROGRAM'
  | 'SEALED';

export class AnimationError extends Error {
  override readonly name = 'AnimationError';
  readonly code: AnimationErrorCode;

  constructor(code: AnimationErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AnimationError);
    }
  }
}

export function isAnimationError(
  value: unknown,
  code?: AnimationErrorCode
): value is AnimationError {
  return (
    value instanceof AnimationError && (code === undefined || value.code === code)
  );
}

/** Throws INVALID_PARAMETER unless `value` is a finite number. */
export function assertFinite(owner: string, label: string, value: number) {
  if (!Number.isFinite(value)) {
    throw new AnimationError(
      'INVALID_PARAMETER',
      `${owner}: ${label} must be a finite number (got ${String(value)})`
    );
  }
}
