import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Network-level failure: connection refused, DNS failure, transport timeout.
 * The underlying error is kept as `cause`.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';
  name = 'TransportError';
  readonly kind = 'transport';
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}
