import { describe, expect, it } from 'vitest';
import { isErrorType } from './isErrorType.js';

class CustomError extends Error {}

class DifferentError extends Error {}

describe('isErrorType', () => {
  it('non-error correctly returns false', () => {
    expect(isErrorType(CustomError, { foo: 'bar' })).toEqual(false);
  });

  it('expect shallow to correctly return true', () => {
    expect(isErrorType(CustomError, new CustomError('test'))).toEqual(true);
  });

  it('expect two layers deep to correctly return true', () => {
    const wrapped = new Error('err1', { cause: new CustomError('test') });

    expect(isErrorType(CustomError, wrapped)).toEqual(true);
  });

  it('expect false on wrapped different error', () => {
    const err = new DifferentError('err2', { cause: new Error('err') });

    expect(isErrorType(CustomError, err)).toEqual(false);
  });
});
