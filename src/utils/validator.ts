import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema synchronously and wraps
 * the result in a tuple-style `[error, value]` response.
 *
 * Both broker flavors validate parameters before any request is issued, so schemas
 * with async refinements are rejected rather than awaited.
 *
 * The error message joins the issue messages with `; `.
 */
export function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrap<Error, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new ValidationError('error async schemas are not supported', []), null];
  }

  if (result.issues) {
    const issues = [...result.issues];
    return [new ValidationError(issues.map((issue) => issue.message).join('; '), issues), null];
  }

  return [null, result.value];
}
