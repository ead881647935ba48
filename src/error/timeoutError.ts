import { isErrorType } from './isErrorType.js';

/**
 * Raised when an exchange exceeds the transport timeout. Always surfaces as the
 * cause of a {@link TransportError}.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
  name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  readonly timeout: number;

  constructor(timeout: number, opts?: ErrorOptions) {
    super(`error request timed out after ${timeout}ms`, opts);
    this.timeout = timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
