import { isErrorType } from './isErrorType.js';

/**
 * Misuse of a batch: adding to or committing an already committed unit,
 * committing outside batch mode, or reading a request the batch never held.
 */
export class BatchStateError extends Error {
  /** BatchStateError error-name */
  static name = 'BatchStateError';
  name = 'BatchStateError';
  readonly kind = 'batch-state';
}

/**
 * Type guard for {@link BatchStateError}.
 */
export function isBatchStateError(error: unknown): error is BatchStateError {
  return isErrorType(BatchStateError, error);
}
