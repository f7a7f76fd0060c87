import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { SiteConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig, type PartialSiteConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
}

/**
 * 解決済みの設定
 */
export interface ResolvedConfig {
  config: SiteConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .sitegen.json > sitegen.json
 */
export const CONFIG_FILE_NAMES = ['.sitegen.json', 'sitegen.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス（デフォルト: ./.sitegen.json）
   * @returns 設定オブジェクト
   */
  static async load(configPath: string = './.sitegen.json'): Promise<SiteConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      const config = validateConfig(parsed);

      // デフォルト値とマージ
      return this.mergeWithDefaults(config);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定（設定ファイルのディレクトリ、なければcwd）
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const {
      configPath: explicitPath,
      traverseUp = true,
      cwd = process.cwd(),
      requireConfig = false,
    } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create a configuration file.\n' +
          'Run: sitegen config init'
      );
    }

    const projectRoot = await this.normalizeProjectRoot(
      configPath ? path.dirname(configPath) : cwd
    );

    const config = configPath ? await this.load(configPath) : this.getDefaultConfig();

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得（呼び出し側が変更しても共有されないようコピーを返す）
   */
  static getDefaultConfig(): SiteConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(
    startDir: string,
    traverseUp: boolean
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 優先順位: 明示指定 > SITEGEN_CONFIG > 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env.SITEGEN_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      return await realpath(absolutePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        // ディレクトリが存在しない場合は絶対パスをそのまま返す
        return absolutePath;
      }
      throw error;
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: PartialSiteConfig): SiteConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      paths: {
        markdowns: config.paths?.markdowns ?? DEFAULT_CONFIG.paths.markdowns,
        templates: config.paths?.templates ?? DEFAULT_CONFIG.paths.templates,
        static: config.paths?.static ?? DEFAULT_CONFIG.paths.static,
        output: config.paths?.output ?? DEFAULT_CONFIG.paths.output,
      },
      documents: {
        extension: config.documents?.extension ?? DEFAULT_CONFIG.documents.extension,
        outputExtension:
          config.documents?.outputExtension ?? DEFAULT_CONFIG.documents.outputExtension,
        order: config.documents?.order ?? DEFAULT_CONFIG.documents.order,
      },
      index: {
        template: config.index?.template ?? DEFAULT_CONFIG.index.template,
      },
      markdown: {
        metadata: config.markdown?.metadata ?? DEFAULT_CONFIG.markdown.metadata,
        gfm: config.markdown?.gfm ?? DEFAULT_CONFIG.markdown.gfm,
        breaks: config.markdown?.breaks ?? DEFAULT_CONFIG.markdown.breaks,
      },
      dates: {
        onInvalid: config.dates?.onInvalid ?? DEFAULT_CONFIG.dates.onInvalid,
      },
      logging: {
        level: config.logging?.level ?? DEFAULT_CONFIG.logging.level,
      },
    };
  }
}
