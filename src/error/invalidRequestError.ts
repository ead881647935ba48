import { isErrorType } from './isErrorType.js';

/**
 * A logical request could not be turned into an outgoing one, e.g. a URI that
 * does not resolve against the base address or a header value fetch rejects.
 */
export class InvalidRequestError extends Error {
  /** InvalidRequestError error-name */
  static name = 'InvalidRequestError';
  name = 'InvalidRequestError';
  readonly kind = 'invalid-request';
  /** URI as given on the logical request */
  #uri: string;

  constructor(message: string, uri: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#uri = uri;
  }

  get uri(): string {
    return this.#uri;
  }
}

/**
 * Type guard for {@link InvalidRequestError}.
 */
export function isInvalidRequestError(error: unknown): error is InvalidRequestError {
  return isErrorType(InvalidRequestError, error);
}
