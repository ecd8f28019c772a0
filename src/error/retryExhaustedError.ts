import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a retry attempts exhausted. The final attempt's error is kept as `cause`.
 */
export class RetryExhaustedError extends Error {
  /** RetryExhaustedError error-name */
  name = 'RetryExhaustedError';
  /** Internal attempts tried before retry was exhausted */
  #attempts: number;
  /** Error returned by the final attempt */
  #lastError: Error;

  /** Creates a new instance of a RetryExhaustedError wrapping the final attempt's error */
  constructor(attempts: number, lastError: Error) {
    super(`error retries exhausted after ${attempts} attempts`, { cause: lastError });
    this.#attempts = attempts;
    this.#lastError = lastError;
  }

  /** Attempts tried before retrying stopped */
  get attempts(): number {
    return this.#attempts;
  }

  /** Error returned by the final attempt */
  get lastError(): Error {
    return this.#lastError;
  }
}

/**
 * Type guard for {@link RetryExhaustedError}.
 */
export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return isErrorType(RetryExhaustedError, error);
}

/**
 * Extract an {@link RetryExhaustedError} from an unknown error value, following nested causes.
 */
export function getRetryExhaustedError(error: unknown): null | RetryExhaustedError {
  return unwrapErrorType(RetryExhaustedError, error);
}
