import { isErrorType } from './isErrorType.js';

/**
 * The caller aborted the operation through its signal. Kept apart from
 * {@link TransportError} so "aborted by me" is not mistaken for a wire failure.
 */
export class CancellationError extends Error {
  /** CancellationError error-name */
  static name = 'CancellationError';
  name = 'CancellationError';
  readonly kind = 'cancellation';
}

/**
 * Type guard for {@link CancellationError}.
 */
export function isCancellationError(error: unknown): error is CancellationError {
  return isErrorType(CancellationError, error);
}
