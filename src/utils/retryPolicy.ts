import { HTTPError } from '../error/httpError.js';
import {
  ConnectError,
  PoolTimeoutError,
  ReadTimeoutError,
  RemoteProtocolError,
  WriteError,
} from '../error/transportError.js';

/** Snapshot of the retry loop handed to stop conditions and wait schedules. */
export interface RetryState {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  /** Error the attempt failed with. */
  error: Error;
  /** Milliseconds since the first attempt started. */
  elapsed: number;
}

/**
 * Retry behavior of a broker call. Each field may be overridden per call;
 * omitted fields fall back to {@link defaultRetryPolicy}.
 */
export interface RetryPolicy {
  /** Returns true when the error is worth another attempt. */
  retry: (error: Error) => boolean;
  /** Returns true when no further attempt should be made. */
  stop: (state: RetryState) => boolean;
  /** Milliseconds to wait before the next attempt. */
  wait: (state: RetryState) => number;
}

/** Statuses a server uses to say "try again later". */
function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

/**
 * Default retry predicate: 429 and 5xx responses, plus transport failures that
 * happen before or while the exchange is in flight.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof HTTPError) {
    return isRetryableStatus(error.status);
  }

  return (
    error instanceof ConnectError ||
    error instanceof ReadTimeoutError ||
    error instanceof WriteError ||
    error instanceof RemoteProtocolError ||
    error instanceof PoolTimeoutError
  );
}

/** Retry predicate built from any error test. */
export function retryIfException(predicate: (error: Error) => boolean): RetryPolicy['retry'] {
  return (error) => predicate(error);
}

/** Stop once `attempts` attempts in total have been made. */
export function stopAfterAttempt(attempts: number): RetryPolicy['stop'] {
  return ({ attempt }) => attempt >= attempts;
}

/** Options for {@link waitExponential}, all in seconds. */
export interface WaitExponentialOptions {
  /** @default 1 */
  multiplier?: number;
  /** @default 0 */
  min?: number;
  /** @default Infinity */
  max?: number;
}

/**
 * Exponential backoff: `multiplier * 2^(attempt - 1)` seconds, clamped to
 * `[min, max]`, returned in milliseconds.
 */
export function waitExponential({
  multiplier = 1,
  min = 0,
  max = Number.POSITIVE_INFINITY,
}: WaitExponentialOptions = {}): RetryPolicy['wait'] {
  return ({ attempt }) => {
    const seconds = multiplier * 2 ** (attempt - 1);
    return Math.min(Math.max(seconds, min), max) * 1000;
  };
}

/** Three attempts in total, waiting 2s before each retry, on transient failures. */
export const defaultRetryPolicy: RetryPolicy = {
  retry: retryIfException(isRetryableError),
  stop: stopAfterAttempt(3),
  wait: waitExponential({ multiplier: 1, min: 2, max: 10 }),
};

/** Fills the fields an override leaves out with the defaults. */
export function resolveRetryPolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
  return {
    retry: overrides?.retry ?? defaultRetryPolicy.retry,
    stop: overrides?.stop ?? defaultRetryPolicy.stop,
    wait: overrides?.wait ?? defaultRetryPolicy.wait,
  };
}
