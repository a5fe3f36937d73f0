/**
 * 表示設定の読み込み
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError, DEFAULT_CACHE_FILE, type TheaterConfig } from '@showtime-console/shared';

export const DEFAULT_CONFIG_FILE = 'showtimes_config.json';
export const DEFAULT_REFRESH_SECONDS = 10;

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * UTCからの時差（時間）をIANAの Etc/GMT ゾーン名にする。
 * Etc/GMT の符号は逆（UTC+9 は Etc/GMT-9）
 */
export function offsetToTimeZone(offsetHours: number): string {
  if (offsetHours === 0) return 'UTC';
  return offsetHours > 0 ? `Etc/GMT-${offsetHours}` : `Etc/GMT+${-offsetHours}`;
}

/**
 * 設定ファイルスキーマ（JSON/YAML共通）
 */
export const ConfigFileSchema = z.object({
  api_key: z.string().min(1).optional(),
  theaters: z.array(
    z.object({
      name: z.string().trim().min(1),
      location: z.string().trim().min(1).optional(),
    })
  ),
  hl: z.string().min(1).default('en'),
  gl: z.string().min(1).default('us'),
  refresh: z.number().int().positive().default(DEFAULT_REFRESH_SECONDS),
  cache_file: z.string().min(1).default(DEFAULT_CACHE_FILE),
  timezone: z.string().refine(isValidTimeZone, { message: 'Unknown time zone' }).optional(),
  timezone_offset: z.number().int().min(-12).max(14).optional(),
  timeout_seconds: z.number().positive().default(15),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * 設定の型定義
 */
export interface AppConfig {
  apiKey: string;
  theaters: TheaterConfig[];
  locale: {
    hl: string;
    gl: string;
  };
  refreshIntervalSeconds: number;
  cachePath: string;
  timeZone: string;
  requestTimeoutMs: number;
}

/**
 * CLIからの上書き設定
 */
export interface ConfigOverrides {
  refreshIntervalSeconds?: number | undefined;
  cachePath?: string | undefined;
}

function readConfigFile(configPath: string): unknown {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${configPath}`, { cause: error });
  }

  try {
    return parse(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse config file: ${configPath}`, { cause: error });
  }
}

/**
 * 設定ファイルを読み込む
 */
export function loadConfig(
  configPath: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const parsed = ConfigFileSchema.safeParse(readConfigFile(configPath));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config ${configPath}: ${details}`);
  }

  const file = parsed.data;
  const apiKey = file.api_key ?? env.SERPAPI_API_KEY;
  if (!apiKey) {
    throw new ConfigError(`Config ${configPath} has no api_key and SERPAPI_API_KEY is not set`);
  }

  return {
    apiKey,
    theaters: file.theaters,
    locale: { hl: file.hl, gl: file.gl },
    refreshIntervalSeconds: overrides.refreshIntervalSeconds ?? file.refresh,
    cachePath: resolve(overrides.cachePath ?? file.cache_file),
    timeZone:
      file.timezone ?? (file.timezone_offset !== undefined ? offsetToTimeZone(file.timezone_offset) : 'UTC'),
    requestTimeoutMs: Math.round(file.timeout_seconds * 1000),
  };
}
