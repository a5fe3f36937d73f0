/**
 * 現在時刻の取得元（テストで差し替え可能）
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Waits for `ms`, resolving early when the signal aborts.
 */
export type Wait = (ms: number, signal?: AbortSignal) => Promise<void>;

/** YYYY-MM-DD形式のUTC日付を取得 */
export function formatUtcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function todayUtc(clock: Clock): string {
  return formatUtcDate(clock.now());
}

export const delay: Wait = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
