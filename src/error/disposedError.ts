import { isErrorType } from './isErrorType.js';

/**
 * Any operation attempted on (or interrupted by) a disposed client.
 */
export class DisposedError extends Error {
  /** DisposedError error-name */
  static name = 'DisposedError';
  name = 'DisposedError';
  readonly kind = 'disposed';

  constructor(message = 'error client was disposed', opts?: ErrorOptions) {
    super(message, opts);
  }
}

/**
 * Type guard for {@link DisposedError}.
 */
export function isDisposedError(error: unknown): error is DisposedError {
  return isErrorType(DisposedError, error);
}
