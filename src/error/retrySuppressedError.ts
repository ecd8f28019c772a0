import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an attempt whose failure the retry predicate rejected,
 * ending the retry loop early. The rejected error is kept as `cause`.
 */
export class RetrySuppressedError extends Error {
  /** RetrySuppressedError error-name */
  name = 'RetrySuppressedError';
  /** Internal attempts tried before retry was suppressed */
  #attempts: number;
  /** Error the predicate declined to retry */
  #lastError: Error;

  /** Creates a new instance of a RetrySuppressedError wrapping the non-retryable error */
  constructor(attempts: number, lastError: Error) {
    super(`error further retries suppressed after ${attempts} attempts`, { cause: lastError });
    this.#attempts = attempts;
    this.#lastError = lastError;
  }

  /** Attempts tried before retry was suppressed */
  get attempts(): number {
    return this.#attempts;
  }

  /** Error the predicate declined to retry */
  get lastError(): Error {
    return this.#lastError;
  }
}

/**
 * Type guard for {@link RetrySuppressedError}.
 */
export function isRetrySuppressedError(error: unknown): error is RetrySuppressedError {
  return isErrorType(RetrySuppressedError, error);
}

/**
 * Extract an {@link RetrySuppressedError} from an unknown error value, following nested causes.
 */
export function getRetrySuppressedError(error: unknown): null | RetrySuppressedError {
  return unwrapErrorType(RetrySuppressedError, error);
}
