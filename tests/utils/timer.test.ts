import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MAX_TIMEOUT_MS, setLongTimeout } from '../../src/utils/timer.js';

describe('setLongTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fire after a short delay', () => {
    const fn = vi.fn();
    setLongTimeout(fn, 1000);

    vi.advanceTimersByTime(999);
    expect(fn).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should wait the whole delay when it exceeds the timer limit', () => {
    const fn = vi.fn();
    setLongTimeout(fn, MAX_TIMEOUT_MS + 5000);

    vi.advanceTimersByTime(MAX_TIMEOUT_MS);
    expect(fn).not.toHaveBeenCalled();

    vi.advanceTimersByTime(4999);
    expect(fn).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should cancel between segments', () => {
    const fn = vi.fn();
    const cancel = setLongTimeout(fn, MAX_TIMEOUT_MS + 5000);

    vi.advanceTimersByTime(MAX_TIMEOUT_MS + 1000);
    cancel();
    vi.advanceTimersByTime(10_000);

    expect(fn).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });
});
