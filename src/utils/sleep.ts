/**
 * Waits for the given number of milliseconds.
 *
 * Useful for delaying execution in async code (e.g. retries, backoff, throttling).
 *
 * @example
 * await sleep(250);
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Blocks the calling thread for the given number of milliseconds.
 *
 * Only meant for the synchronous broker, which already blocks its caller for the
 * duration of each request.
 */
export function sleepSync(ms: number): void {
  if (ms <= 0) {
    return;
  }

  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}
