import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request never produced a response: the connection, the
 * socket or the HTTP exchange itself failed.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  name = 'TransportError';
  /** Low-level error code reported by the socket layer, when known */
  code?: string;

  /** Creates a new TransportError, optionally tagged with the low-level error code */
  constructor(message: string, opts?: ErrorOptions & { code?: string }) {
    super(message, opts);
    this.code = opts?.code;
  }
}

/** The connection to the remote host (or proxy) could not be established. */
export class ConnectError extends TransportError {
  name = 'ConnectError';
}

/** No response (or no further body data) arrived within the configured timeout. */
export class ReadTimeoutError extends TransportError {
  name = 'ReadTimeoutError';
}

/** Sending the request to the remote host failed mid-write. */
export class WriteError extends TransportError {
  name = 'WriteError';
}

/** The remote host broke the HTTP exchange (closed early, malformed response). */
export class RemoteProtocolError extends TransportError {
  name = 'RemoteProtocolError';
}

/** Waiting for a free connection in the pool took too long. */
export class PoolTimeoutError extends TransportError {
  name = 'PoolTimeoutError';
}

/**
 * Type guard for {@link TransportError} and its subclasses.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}
