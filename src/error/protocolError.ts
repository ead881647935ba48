import type { Response } from 'undici';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * A response was received but its status is outside 2xx.
 */
export class ProtocolError extends Error {
  /** ProtocolError error-name */
  static name = 'ProtocolError';
  name = 'ProtocolError';
  readonly kind = 'protocol';
  /** Response status code */
  readonly status: number;
  /** Reason phrase reported with the status */
  readonly reason: string;
  /** Response causing the ProtocolError */
  #response: Response;

  constructor(response: Response, message = `error response status ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
    this.status = response.status;
    this.reason = response.statusText;
  }

  /**
   * Response causing the ProtocolError. A clone is returned while the body is unread,
   * so the body can be consumed more than once.
   */
  get response(): Response {
    return this.#response.bodyUsed ? this.#response : this.#response.clone();
  }
}

/**
 * Type guard for {@link ProtocolError}.
 */
export function isProtocolError(error: unknown): error is ProtocolError {
  return isErrorType(ProtocolError, error);
}

/**
 * Extract a {@link ProtocolError} from an unknown error value, following nested causes.
 */
export function getProtocolError(error: unknown): ProtocolError | null {
  return unwrapErrorType(ProtocolError, error);
}
