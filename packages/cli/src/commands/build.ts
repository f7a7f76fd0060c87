/**
 * build コマンド
 * サイトを1回ビルドする
 */

import { ConfigLoader, type InvalidDatePolicy, type LogLevel } from '@sitegen/types';
import { SiteBuilder, createLogger, DateParseError, type BuildResult } from '@sitegen/builder';

export interface BuildCommandOptions {
  /** 設定ファイルのパス */
  config?: string;
  /** プロジェクトルート（設定ファイルの探索開始位置、デフォルト: cwd） */
  root?: string;
  /** debugログを出力 */
  verbose?: boolean;
  /** 警告とエラーのみ出力 */
  quiet?: boolean;
  /** 解析できない日付の扱い（設定ファイルより優先） */
  onInvalidDate?: InvalidDatePolicy;
}

function resolveLogLevel(options: BuildCommandOptions, configured: LogLevel): LogLevel {
  if (options.verbose) {
    return 'debug';
  }
  if (options.quiet) {
    return 'warn';
  }
  return configured;
}

/**
 * ビルドを実行（エラーはそのまま伝播）
 */
export async function runBuild(options: BuildCommandOptions = {}): Promise<BuildResult> {
  const resolved = await ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.root ?? process.cwd(),
  });
  const config = options.onInvalidDate
    ? { ...resolved.config, dates: { onInvalid: options.onInvalidDate } }
    : resolved.config;

  const logger = createLogger({ level: resolveLogLevel(options, config.logging.level) });
  logger.debug(`Loading config from: ${resolved.configPath ?? 'default config'}`);
  logger.debug(`Project root: ${resolved.projectRoot}`);

  const builder = new SiteBuilder({ config, projectRoot: resolved.projectRoot, logger });
  return builder.build();
}

/**
 * build コマンドを実行
 * 失敗時は終了コード1
 */
export async function executeBuild(options: BuildCommandOptions = {}): Promise<void> {
  try {
    await runBuild(options);
  } catch (error) {
    if (error instanceof DateParseError) {
      console.error(`エラー: ${error.message}`);
      console.error('Use --on-invalid-date warn to skip unparsable dates.');
    } else if (error instanceof Error) {
      console.error('Build failed:', error);
    } else {
      console.error('エラー: 不明なエラーが発生しました。');
    }
    process.exitCode = 1;
  }
}
