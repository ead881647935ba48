import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * The batch exchange completed but its body could not be attributed: either the
 * whole payload is not multipart, or one token's sub-response is missing or malformed.
 */
export class BatchResponseError extends Error {
  /** BatchResponseError error-name */
  static name = 'BatchResponseError';
  name = 'BatchResponseError';
  readonly kind = 'batch-response';
  /** Raw text that failed to parse, when there was any */
  readonly part: string | null;

  constructor(message: string, part: string | null = null, opts?: ErrorOptions) {
    super(message, opts);
    this.part = part;
  }
}

/**
 * Type guard for {@link BatchResponseError}.
 */
export function isBatchResponseError(error: unknown): error is BatchResponseError {
  return isErrorType(BatchResponseError, error);
}

/**
 * Extract a {@link BatchResponseError} from an unknown error value, following nested causes.
 */
export function getBatchResponseError(error: unknown): BatchResponseError | null {
  return unwrapErrorType(BatchResponseError, error);
}
