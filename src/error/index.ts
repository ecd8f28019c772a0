/**
 * Error entrypoint: exports the broker's error classes and helpers for identifying and unwrapping them.
 * @module
 */

/** Error raised for invalid broker or connector settings. */
export { ConfigurationError, getConfigurationError, isConfigurationError } from './configurationError.js';
/** Error representing a non-2xx HTTP response. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Retry loop outcomes, never thrown by the brokers themselves. */
export { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';
export { getRetrySuppressedError, isRetrySuppressedError, RetrySuppressedError } from './retrySuppressedError.js';
/** Network-level failures, split by the stage that failed. */
export {
  ConnectError,
  getTransportError,
  isTransportError,
  PoolTimeoutError,
  ReadTimeoutError,
  RemoteProtocolError,
  TransportError,
  WriteError,
} from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when request parameters are rejected before any network call. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
