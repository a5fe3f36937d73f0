/**
 * Display cycle controller.
 *
 * 起動時にキャッシュを確認し（なければ取得）、映画館ごとに一定間隔で表示を切り替える。
 * 各tickでUTC日付の変化をチェックし、日付が変わっていれば再取得して先頭から表示し直す。
 */

import type { Logger } from 'pino';
import {
  delay,
  isFresh,
  systemClock,
  todayUtc,
  type CacheSnapshot,
  type CacheStore,
  type Clock,
  type FetchOne,
  type TheaterConfig,
  type Wait,
} from '@showtime-console/shared';
import type { DisplayUnit, RenderTarget, Renderer } from './render.js';

export interface CycleDeps {
  cache: CacheStore;
  theaters: readonly TheaterConfig[];
  fetchOne: FetchOne;
  render: Renderer;
  refreshIntervalSeconds: number;
  logger: Logger;
  clock?: Clock;
  wait?: Wait;
  signal?: AbortSignal | undefined;
}

/**
 * 表示ループの状態（現在のスナップショットと表示位置）
 */
export interface CycleState {
  snapshot: CacheSnapshot;
  units: DisplayUnit[];
  index: number;
}

export function flattenSnapshot(snapshot: CacheSnapshot): DisplayUnit[] {
  return snapshot.theaters.map((theater, i) => ({
    theater,
    position: i + 1,
    total: snapshot.theaters.length,
  }));
}

/** 循環して次の表示位置を返す（0件なら0のまま） */
export function nextIndex(index: number, length: number): number {
  if (length === 0) return 0;
  return (index + 1) % length;
}

export function currentTarget(state: CycleState): RenderTarget {
  const unit = state.units[state.index];
  return unit ? { kind: 'theater', unit } : { kind: 'empty' };
}

/**
 * 当日のスナップショットを用意する（キャッシュが古ければ再取得）
 */
export async function refreshState(deps: CycleDeps): Promise<CycleState> {
  const today = todayUtc(deps.clock ?? systemClock);
  const cached = deps.cache.load();

  let snapshot: CacheSnapshot;
  if (cached && isFresh(cached, today)) {
    deps.logger.info({ date: cached.date, theaters: cached.theaters.length }, 'using cached showtimes');
    snapshot = cached;
  } else {
    if (cached) {
      deps.logger.info({ cached: cached.date, today }, 'cached showtimes are stale');
    }
    snapshot = await deps.cache.refreshAll(deps.theaters, deps.fetchOne, deps.signal);
  }

  const units = flattenSnapshot(snapshot);
  if (units.length === 0) {
    deps.logger.warn('no theaters to display');
  }
  return { snapshot, units, index: 0 };
}

async function renderSafely(target: RenderTarget, deps: CycleDeps): Promise<void> {
  try {
    await deps.render(target);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    deps.logger.error({ err }, 'render failed');
  }
}

/**
 * 1回分の表示処理: 日付チェック → 表示 → 待機 → 次へ
 */
export async function tick(state: CycleState, deps: CycleDeps): Promise<CycleState> {
  let current = state;

  const today = todayUtc(deps.clock ?? systemClock);
  if (!isFresh(current.snapshot, today)) {
    deps.logger.info({ from: current.snapshot.date, to: today }, 'date rolled over, refreshing');
    current = await refreshState(deps);
    if (deps.signal?.aborted) return current;
  }

  await renderSafely(currentTarget(current), deps);

  const wait = deps.wait ?? delay;
  await wait(deps.refreshIntervalSeconds * 1000, deps.signal);

  return { ...current, index: nextIndex(current.index, current.units.length) };
}

/**
 * 停止シグナルを受けるまで表示を繰り返す
 */
export async function runDisplayCycle(deps: CycleDeps): Promise<void> {
  if (deps.signal?.aborted) {
    deps.logger.debug('display cycle stopped before start');
    return;
  }
  let state = await refreshState(deps);

  while (!deps.signal?.aborted) {
    state = await tick(state, deps);
  }

  deps.logger.debug('display cycle stopped');
}

/**
 * 全映画館を待機なしで1回ずつ表示する
 */
export async function renderAllOnce(deps: CycleDeps): Promise<CycleState> {
  const state = await refreshState(deps);
  if (deps.signal?.aborted) return state;

  if (state.units.length === 0) {
    await renderSafely({ kind: 'empty' }, deps);
    return state;
  }
  for (const unit of state.units) {
    await renderSafely({ kind: 'theater', unit }, deps);
  }
  return state;
}
