/**
 * ロガー
 * エントリポイントで一度だけ生成し、パイプラインへ明示的に渡す
 */

import type { LogLevel } from '@sitegen/types';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  /** 出力する最低レベル（デフォルト: info） */
  level?: LogLevel;
  /** メッセージの接頭辞（例: SiteBuilder → "[SiteBuilder] ..."） */
  prefix?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * consoleに出力するロガーを生成
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const format = (message: string): string =>
    options.prefix ? `[${options.prefix}] ${message}` : message;

  return {
    debug(message, ...details) {
      if (threshold <= LEVEL_ORDER.debug) {
        console.debug(format(message), ...details);
      }
    },
    info(message, ...details) {
      if (threshold <= LEVEL_ORDER.info) {
        console.log(format(message), ...details);
      }
    },
    warn(message, ...details) {
      if (threshold <= LEVEL_ORDER.warn) {
        console.warn(format(message), ...details);
      }
    },
    error(message, ...details) {
      if (threshold <= LEVEL_ORDER.error) {
        console.error(format(message), ...details);
      }
    },
  };
}

/** 何も出力しないロガー（テスト用） */
export const silentLogger: Logger = createLogger({ level: 'silent' });
