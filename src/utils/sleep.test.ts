import { afterEach, describe, expect, it, vi } from 'vitest';
import { sleep, sleepSync } from './sleep.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('sleep', () => {
  it('resolves after the given delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const promise = sleep(2000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(1999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await promise;
    expect(done).toBe(true);
  });
});

describe('sleepSync', () => {
  it('returns immediately for non-positive delays', () => {
    const started = Date.now();
    sleepSync(0);
    sleepSync(-5);

    expect(Date.now() - started).toBeLessThan(50);
  });

  it('blocks for roughly the given delay', () => {
    const started = Date.now();
    sleepSync(30);

    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
  });
});
