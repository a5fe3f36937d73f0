import { pino, type Logger } from 'pino';

/**
 * ロガー設定
 * 画面表示（stdout）と混ざらないよう stderr に出力する
 */
export function createLogger(verbose = false): Logger {
  return pino({
    level: verbose ? 'debug' : (process.env.LOG_LEVEL ?? 'info'),
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        destination: 2,
      },
    },
  });
}
