import { describe, it, expect, vi, afterEach } from 'vitest';
import { delay, formatUtcDate, todayUtc } from '../clock.js';

describe('formatUtcDate', () => {
  it('should use the UTC calendar date', () => {
    expect(formatUtcDate(new Date('2025-12-22T23:59:59Z'))).toBe('2025-12-22');
    expect(formatUtcDate(new Date('2025-12-23T00:00:00Z'))).toBe('2025-12-23');
  });

  it('should ignore the offset of the input', () => {
    expect(formatUtcDate(new Date('2025-12-22T20:00:00-08:00'))).toBe('2025-12-23');
  });
});

describe('todayUtc', () => {
  it('should read the date from the clock', () => {
    expect(todayUtc({ now: () => new Date('2026-01-01T00:00:00Z') })).toBe('2026-01-01');
  });
});

describe('delay', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the given time', async () => {
    vi.useFakeTimers();
    let resolved = false;
    const waiting = delay(10_000).then(() => {
      resolved = true;
    });

    await vi.advanceTimersByTimeAsync(9_999);
    expect(resolved).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await waiting;
    expect(resolved).toBe(true);
  });

  it('should resolve early when aborted', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    let resolved = false;
    const waiting = delay(60_000, controller.signal).then(() => {
      resolved = true;
    });

    controller.abort();
    await waiting;
    expect(resolved).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should resolve immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(delay(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
