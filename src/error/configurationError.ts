import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised while constructing a broker or connector from invalid settings,
 * e.g. a missing API key or `mounts` handed to the async executor.
 */
export class ConfigurationError extends Error {
  /** ConfigurationError error-name */
  name = 'ConfigurationError';
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}

/**
 * Extract a {@link ConfigurationError} from an unknown error value, following nested causes.
 */
export function getConfigurationError(error: unknown): null | ConfigurationError {
  return unwrapErrorType(ConfigurationError, error);
}
