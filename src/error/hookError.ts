import { isErrorType } from './isErrorType.js';

/** Hook phases that can fail. */
export type HookPhase = 'beforeRequest' | 'afterResponse';

/**
 * A user hook threw. The thrown value is kept as `cause`.
 */
export class HookError extends Error {
  /** HookError error-name */
  static name = 'HookError';
  name = 'HookError';
  readonly kind = 'hook';
  readonly phase: HookPhase;

  constructor(phase: HookPhase, opts?: ErrorOptions) {
    super(`error in ${phase} hook`, opts);
    this.phase = phase;
  }
}

/**
 * Type guard for {@link HookError}.
 */
export function isHookError(error: unknown): error is HookError {
  return isErrorType(HookError, error);
}
