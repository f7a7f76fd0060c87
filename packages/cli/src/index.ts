#!/usr/bin/env tsx
/**
 * sitegen CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { executeBuild, type BuildCommandOptions } from './commands/build.js';
import { initConfig, type ConfigInitOptions } from './commands/config/init.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

const program = new Command();

program
  .name('sitegen')
  .description('Markdown文書から静的サイトを生成')
  .version(packageJson.version);

// build コマンド（デフォルト）
program
  .command('build', { isDefault: true })
  .description('サイトをビルド')
  .addOption(new Option('-c, --config <path>', '設定ファイルのパス').env('SITEGEN_CONFIG'))
  .option('--root <dir>', 'プロジェクトルート（デフォルト: カレントディレクトリ）')
  .addOption(
    new Option('--on-invalid-date <policy>', '解析できない日付の扱い').choices(['fail', 'warn'])
  )
  .addOption(new Option('-v, --verbose', '詳細なログを出力').conflicts('quiet'))
  .option('-q, --quiet', '警告とエラーのみ出力')
  .action(async (options: BuildCommandOptions) => {
    await executeBuild(options);
  });

// config コマンド
const configCmd = program
  .command('config')
  .description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('-f, --force', '既存ファイルを上書き')
  .action(async (options: ConfigInitOptions) => {
    try {
      await initConfig(options);
    } catch (error) {
      console.error(`エラー: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  });

// コマンドラインを解析
await program.parseAsync(process.argv);
