import { afterEach, describe, expect, it, vi } from 'vitest';
import { ReadTimeoutError } from '../error/transportError.js';
import { createTimeoutSignal } from './signals.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('createTimeoutSignal', () => {
  it('returns null when disabled', () => {
    expect(createTimeoutSignal()).toBeNull();
    expect(createTimeoutSignal(0)).toBeNull();
    expect(createTimeoutSignal(false)).toBeNull();
  });

  it('aborts after the configured timeout with a ReadTimeoutError', async () => {
    vi.useFakeTimers();
    const signal = createTimeoutSignal(50)?.signal;

    expect(signal?.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(50);

    expect(signal?.aborted).toBe(true);
    expect(signal?.reason).toBeInstanceOf(ReadTimeoutError);
    expect(signal?.reason).toHaveProperty('message', 'error request timed out after 50ms');
  });

  it('creates independent signals for separate invocations', () => {
    vi.useFakeTimers();

    const first = createTimeoutSignal(10)?.signal;
    const second = createTimeoutSignal(20)?.signal;

    vi.advanceTimersByTime(15);

    expect(first?.aborted).toBe(true);
    expect(second?.aborted).toBe(false);
  });

  it('never aborts once cleared', () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(50);

    timeout?.clear();
    vi.advanceTimersByTime(100);

    expect(timeout?.signal.aborted).toBe(false);
  });
});
