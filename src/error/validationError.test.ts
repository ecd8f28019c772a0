import { describe, expect, it } from 'vitest';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';
import { isValidationError, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('keeps message and issues', () => {
    const err = new ValidationError('error-validating', [{ message: 'bad key', path: ['foo'] }]);

    expect(err.message).toBe('error-validating');
    expect(err.issues).toEqual([{ message: 'bad key', path: ['foo'] }]);
    expect(isErrorType(ValidationError, err)).toBe(true);
  });

  it('expect non ValidationError to return false', () => {
    expect(isValidationError(new Error('error'))).toBe(false);
  });

  it('unwraps a wrapped ValidationError', () => {
    const validationErr = new ValidationError('error-validating', []);
    const err = new Error('error', { cause: validationErr });

    expect(unwrapErrorType(ValidationError, err)).toStrictEqual(validationErr);
  });
});
