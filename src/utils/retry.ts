import { HTTPError } from '../error/httpError.js';
import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import type { RetryPolicy } from './retryPolicy.js';
import { sleep, sleepSync } from './sleep.js';
import type { SafeWrap, SafeWrapAsync } from './wrap.js';

/** Options for the retry functions */
export interface RetryOptions<Result> {
  /** Function to execute; must return a tuple-style result. */
  fn: () => Result;
  /** Predicate, stop condition and wait schedule. */
  policy: RetryPolicy;
}

/** What to do after a failed attempt. */
type Verdict = { error: Error } | { delay: number };

function judge(policy: RetryPolicy, error: Error, attempt: number, startedAt: number): Verdict {
  if (!policy.retry(error)) {
    return { error: new RetrySuppressedError(attempt, error) };
  }

  const state = { attempt, error, elapsed: Date.now() - startedAt };
  if (policy.stop(state)) {
    return { error: new RetryExhaustedError(attempt, error) };
  }

  return { delay: policy.wait(state) };
}

/**
 * Retry-function to keep retrying a function that can error, waiting between
 * attempts as the policy dictates.
 *
 * `This is for functions that catches their own errors and return them in a tuple structure like [Error, Response]`
 *
 * A failure the policy declines to retry comes back as a {@link RetrySuppressedError},
 * a failure on the last allowed attempt as a {@link RetryExhaustedError}; both keep the
 * attempt's error as `cause`.
 */
export async function retry<R>({ fn, policy }: RetryOptions<SafeWrapAsync<Error, R>>): SafeWrapAsync<Error, R> {
  const startedAt = Date.now();
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn();
    if (!err) {
      return [null, data];
    }

    const verdict = judge(policy, err, attempt, startedAt);
    if ('error' in verdict) {
      return [verdict.error, null];
    }

    // A discarded response would hold its connection until collected.
    if (err instanceof HTTPError && err.response.body && !err.response.bodyUsed) {
      await err.response.body.cancel();
    }

    await sleep(verdict.delay);
  }
}

/**
 * Blocking twin of {@link retry} for the synchronous broker.
 */
export function retrySync<R>({ fn, policy }: RetryOptions<SafeWrap<Error, R>>): SafeWrap<Error, R> {
  const startedAt = Date.now();
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = fn();
    if (!err) {
      return [null, data];
    }

    const verdict = judge(policy, err, attempt, startedAt);
    if ('error' in verdict) {
      return [verdict.error, null];
    }

    sleepSync(verdict.delay);
  }
}
