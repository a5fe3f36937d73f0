import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { Logger } from 'pino';
import { systemClock, todayUtc, type Clock } from '../clock.js';
import { CacheReadError, CacheWriteError } from '../errors.js';
import { CacheSnapshotSchema, type CacheSnapshot, type TheaterResult } from '../types/snapshot.js';
import { describeFetchError, type FetchOne, type TheaterConfig, type TheaterListing } from '../types/theater.js';

export const DEFAULT_CACHE_FILE = 'showtimes_cache.json';

export interface CacheStoreOptions {
  path: string;
  logger: Logger;
  clock?: Clock;
}

/**
 * 1日分の上映スケジュールを保持するキャッシュファイル
 */
export interface CacheStore {
  readonly path: string;
  load(): CacheSnapshot | null;
  store(snapshot: CacheSnapshot): void;
  /**
   * 全映画館を順に取得して保存する。
   * signal が中断されたら残りの映画館は取得せず、保存もしない
   */
  refreshAll(
    theaters: readonly TheaterConfig[],
    fetchOne: FetchOne,
    signal?: AbortSignal
  ): Promise<CacheSnapshot>;
}

/**
 * スナップショットが当日（UTC）のものか
 */
export function isFresh(snapshot: CacheSnapshot, today: string): boolean {
  return snapshot.date === today;
}

function readSnapshot(path: string): CacheSnapshot {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new CacheReadError(path, 'unreadable', { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new CacheReadError(path, 'invalid JSON', { cause: error });
  }

  const parsed = CacheSnapshotSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unexpected shape';
    throw new CacheReadError(path, where);
  }
  return parsed.data;
}

async function fetchListing(
  theater: TheaterConfig,
  fetchOne: FetchOne,
  logger: Logger
): Promise<TheaterListing | null> {
  try {
    const result = await fetchOne(theater);
    if (result.ok) {
      logger.debug({ theater: theater.name, movies: result.value.movies.length }, 'showtimes fetched');
      return result.value;
    }
    logger.warn({ theater: theater.name, error: describeFetchError(result.error) }, 'failed to fetch showtimes');
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.warn({ theater: theater.name, err }, 'failed to fetch showtimes');
  }
  return null;
}

/**
 * JSONファイルを使ったキャッシュストアを作成する
 */
export function createCacheStore(options: CacheStoreOptions): CacheStore {
  const path = resolve(options.path);
  const clock = options.clock ?? systemClock;
  const logger = options.logger;

  function load(): CacheSnapshot | null {
    if (!existsSync(path)) {
      logger.debug({ path }, 'no cache file');
      return null;
    }

    try {
      return readSnapshot(path);
    } catch (error) {
      if (error instanceof CacheReadError) {
        logger.warn({ path, reason: error.message }, 'ignoring unusable cache file');
        return null;
      }
      throw error;
    }
  }

  function store(snapshot: CacheSnapshot): void {
    const tmpPath = `${path}.${process.pid}.tmp`;
    try {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(tmpPath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf-8');
      renameSync(tmpPath, path);
    } catch (error) {
      if (existsSync(tmpPath)) rmSync(tmpPath, { force: true });
      throw new CacheWriteError(path, { cause: error });
    }
  }

  async function refreshAll(
    theaters: readonly TheaterConfig[],
    fetchOne: FetchOne,
    signal?: AbortSignal
  ): Promise<CacheSnapshot> {
    const date = todayUtc(clock);
    logger.info({ date, theaters: theaters.length }, 'refreshing showtimes');

    const results: TheaterResult[] = [];
    let failed = 0;
    for (const theater of theaters) {
      if (signal?.aborted) break;
      const listing = await fetchListing(theater, fetchOne, logger);
      // 中断で失敗した取得結果は記録しない
      if (signal?.aborted) break;
      if (!listing) failed++;
      results.push({
        name: theater.name,
        location: theater.location ?? null,
        address: listing?.address ?? null,
        movies: listing?.movies ?? [],
      });
    }

    const snapshot: CacheSnapshot = { date, theaters: results };

    if (signal?.aborted) {
      logger.info({ date, fetched: results.length, theaters: theaters.length }, 'refresh interrupted, cache not saved');
      return snapshot;
    }

    try {
      store(snapshot);
    } catch (error) {
      if (!(error instanceof CacheWriteError)) throw error;
      // 保存できなくてもメモリ上のスナップショットで表示を続ける
      logger.error({ path, reason: error.message }, 'failed to persist showtimes cache');
    }

    logger.info({ date, theaters: results.length, failed }, 'showtimes refreshed');
    return snapshot;
  }

  return { path, load, store, refreshAll };
}
