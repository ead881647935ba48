import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * - Sync and async schemas are both supported.
 * - A schema that throws, or returns something other than a result object,
 *   yields a `ValidationError` without issues and the thrown value as `cause`.
 * - A result with `issues` yields a `ValidationError` carrying those issues.
 */
export async function validator<T extends StandardSchemaV1>(
  input: StandardSchemaV1.InferInput<T>,
  schema: T,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [errStart, started] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (errStart) {
    return [new ValidationError('error validating on validation start', [], { cause: errStart }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(started));
  if (errAsync) {
    return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation failed with empty results', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}
