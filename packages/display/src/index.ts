// @showtime-console/display
// Console display cycle for cached showtimes

import type { Logger } from 'pino';
import { createCacheStore, type CacheSnapshot } from '@showtime-console/shared';
import { createSerpApiFetcher } from '@showtime-console/fetcher';
import type { AppConfig } from './config.js';
import { runDisplayCycle, renderAllOnce, type CycleDeps } from './cycle.js';
import { createConsoleRenderer, type RenderOutput } from './render.js';

export * from './config.js';
export * from './cycle.js';
export * from './render.js';
export { createLogger } from './logger.js';

export type RunMode = 'cycle' | 'once' | 'fetch-only';

/**
 * 実行オプション
 */
export interface RunOptions {
  config: AppConfig;
  mode: RunMode;
  logger: Logger;
  signal?: AbortSignal | undefined;
  output?: RenderOutput;
}

function summarize(snapshot: CacheSnapshot) {
  return {
    date: snapshot.date,
    theaters: snapshot.theaters.length,
    movies: snapshot.theaters.reduce((sum, t) => sum + t.movies.length, 0),
    emptyTheaters: snapshot.theaters.filter((t) => t.movies.length === 0).length,
  };
}

/**
 * 設定から各コンポーネントを組み立てて実行する
 */
export async function runShowtimesConsole(options: RunOptions): Promise<void> {
  const { config, logger, signal } = options;

  const cache = createCacheStore({ path: config.cachePath, logger });
  const fetcher = createSerpApiFetcher({
    apiKey: config.apiKey,
    hl: config.locale.hl,
    gl: config.locale.gl,
    timeoutMs: config.requestTimeoutMs,
    signal,
    logger,
  });
  const fetchOne = fetcher.fetchTheater.bind(fetcher);

  if (options.mode === 'fetch-only') {
    const snapshot = await cache.refreshAll(config.theaters, fetchOne, signal);
    if (signal?.aborted) return;
    logger.info(summarize(snapshot), 'cache refreshed');
    return;
  }

  const deps: CycleDeps = {
    cache,
    theaters: config.theaters,
    fetchOne,
    render: createConsoleRenderer({
      output: options.output,
      timeZone: config.timeZone,
      clearScreen: options.mode === 'cycle',
    }),
    refreshIntervalSeconds: config.refreshIntervalSeconds,
    logger,
    signal,
  };

  if (options.mode === 'once') {
    await renderAllOnce(deps);
    return;
  }

  logger.info(
    { theaters: config.theaters.length, refresh: `${config.refreshIntervalSeconds}s`, cache: config.cachePath },
    'starting display cycle'
  );
  await runDisplayCycle(deps);
}
