/**
 * Error entrypoint: the classified failures returned by the executor and batch
 * coordinator, plus helpers for identifying and unwrapping them.
 * @module
 */
import type { BatchResponseError } from './batchResponseError.js';
import type { BatchStateError } from './batchStateError.js';
import type { CancellationError } from './cancellationError.js';
import type { DisposedError } from './disposedError.js';
import type { HookError } from './hookError.js';
import type { InvalidRequestError } from './invalidRequestError.js';
import type { ProtocolError } from './protocolError.js';
import type { TransportError } from './transportError.js';

export { BatchResponseError, getBatchResponseError, isBatchResponseError } from './batchResponseError.js';
export { BatchStateError, isBatchStateError } from './batchStateError.js';
export { CancellationError, isCancellationError } from './cancellationError.js';
export { DisposedError, isDisposedError } from './disposedError.js';
export { HookError, type HookPhase, isHookError } from './hookError.js';
export { InvalidRequestError, isInvalidRequestError } from './invalidRequestError.js';
export { isErrorType } from './isErrorType.js';
export { getProtocolError, isProtocolError, ProtocolError } from './protocolError.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
export { getTransportError, isTransportError, TransportError } from './transportError.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';

/**
 * Every classified failure a request or batch can end in. Branch on `kind`.
 */
export type RequestError =
  | TransportError
  | ProtocolError
  | CancellationError
  | DisposedError
  | BatchStateError
  | BatchResponseError
  | InvalidRequestError
  | HookError;
