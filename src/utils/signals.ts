import { ReadTimeoutError } from '../error/transportError.js';

/** A timeout signal together with the means to disarm it. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Stops the timer; the signal then never aborts. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort after
 * the specified timeout, with a {@link ReadTimeoutError} as its reason.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created. The timer
 * is unref'd so a pending timeout never keeps the process alive.
 *
 * @param timeoutMs - Timeout in milliseconds, or `false` to disable.
 * @returns The signal and its `clear` function, or `null`.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new ReadTimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );
  timeout.unref();

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}
