/**
 * 設定ファイルが読めない・不正な場合のエラー（致命的）
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * キャッシュファイルの読み込み失敗（キャッシュなしとして扱う）
 */
export class CacheReadError extends Error {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Cannot read cache ${path}: ${reason}`, options);
    this.name = 'CacheReadError';
    this.path = path;
  }
}

/**
 * キャッシュファイルの書き込み失敗
 */
export class CacheWriteError extends Error {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : 'unknown error';
    super(`Cannot write cache ${path}: ${reason}`, options);
    this.name = 'CacheWriteError';
    this.path = path;
  }
}
