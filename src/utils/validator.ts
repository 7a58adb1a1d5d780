import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)`, which may be sync or async.
 * - A throwing (or rejecting) validator comes back as a `ValidationError` with the thrown value as cause.
 * - A result carrying `issues` comes back as a `ValidationError` listing them.
 * - Otherwise returns `[null, value]` with the schema's output.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
  const [errStart, pending] = safeWrap(() => schema['~standard'].validate(input));
  if (errStart) {
    return [new ValidationError('error validating on validation start', [], { cause: errStart }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
