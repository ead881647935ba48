/**
 * Tuple-based result used throughout the client, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Normalizes a thrown value into an `Error`, keeping non-errors as `cause`.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  return new Error(typeof value === 'string' ? value : 'error non-error value thrown', { cause: value });
}

/**
 * Gracefully handles a given Promise factory.
 * @example
 * const [error, data] = await safeWrapAsync(() => asyncAction());
 */
export async function safeWrapAsync<DataType>(promise: () => Promise<DataType>): SafeWrapAsync<Error, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}

/**
 * Wrap a synchronous function in a tuple-style result.
 */
export function safeWrap<DataType>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}
