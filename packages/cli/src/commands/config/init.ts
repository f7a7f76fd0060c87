/**
 * config init コマンド
 * デフォルト設定で設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CONFIG_FILE_NAMES, ConfigLoader } from '@sitegen/types';

export interface ConfigInitOptions {
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * config init コマンドを実行
 * @returns 生成した設定ファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, CONFIG_FILE_NAMES[0]);

  console.log('Initializing sitegen configuration...\n');

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` +
          'Use --force to overwrite the existing file.'
      );
    }

    console.log('⚠️  Overwriting existing configuration file...\n');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }

  const config = ConfigLoader.getDefaultConfig();
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');

  console.log('✅ Configuration file created successfully!\n');
  console.log(`📄 File: ${configPath}`);
  console.log(`📝 Documents: ${config.paths.markdowns}/*${config.documents.extension}`);
  console.log(`📁 Output: ${config.paths.output}\n`);
  console.log('Next steps:');
  console.log(`  1. Review and customize ${CONFIG_FILE_NAMES[0]}`);
  console.log(`  2. Add a template: ${config.paths.templates}/${config.index.template}`);
  console.log('  3. Build the site: sitegen build\n');

  return configPath;
}
