#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { ConfigError } from '@showtime-console/shared';
import { DEFAULT_CONFIG_FILE, loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { runShowtimesConsole, type RunMode } from './index.js';

interface CliOptions {
  config: string;
  refresh?: number;
  cacheFile?: string;
  once: boolean;
  fetchOnly: boolean;
  verbose: boolean;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('正の整数を指定してください');
  }
  return n;
}

const program = new Command();

program
  .name('showtimes-console')
  .description('SerpAPIで取得した映画館の上映スケジュールをコンソールに順番に表示する')
  .version('1.0.0')
  .option('-c, --config <path>', '設定ファイル（JSON/YAML）のパス', DEFAULT_CONFIG_FILE)
  .option('-r, --refresh <seconds>', '1館あたりの表示秒数（設定ファイルより優先）', parsePositiveInt)
  .option('--cache-file <path>', 'キャッシュファイルのパス（設定ファイルより優先）')
  .option('--once', '全映画館を1回ずつ表示して終了', false)
  .option('--fetch-only', 'キャッシュを再取得して終了', false)
  .option('-v, --verbose', '詳細ログを出力', false)
  .action(async (options: CliOptions) => {
    const logger = createLogger(options.verbose);

    // 設定読み込み（失敗したらループに入らず終了）
    let config: AppConfig;
    try {
      config = loadConfig(options.config, {
        refreshIntervalSeconds: options.refresh,
        cachePath: options.cacheFile,
      });
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.error({ err: error }, '設定ファイルを読み込めません');
        process.exitCode = 1;
        return;
      }
      throw error;
    }

    const mode: RunMode = options.fetchOnly ? 'fetch-only' : options.once ? 'once' : 'cycle';

    // Ctrl+C / SIGTERM で待機中の表示ループを止める
    const controller = new AbortController();
    const stop = (): void => controller.abort();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    try {
      await runShowtimesConsole({ config, mode, logger, signal: controller.signal });
      if (controller.signal.aborted) {
        process.stdout.write('\n\nStopped by user\n');
      }
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err }, '予期しないエラーが発生しました');
      process.exitCode = 1;
    } finally {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
    }
  });

await program.parseAsync();
