/**
 * 設定ファイルの型定義
 */

export interface SiteConfig {
  version: string;
  paths: PathsConfig;
  documents: DocumentsConfig;
  index: IndexConfig;
  markdown: MarkdownConfig;
  dates: DatesConfig;
  logging: LoggingConfig;
}

export interface PathsConfig {
  /** Markdown文書のディレクトリ */
  markdowns: string;
  /** テンプレートのディレクトリ */
  templates: string;
  /** 静的ファイルのディレクトリ */
  static: string;
  /** 出力ディレクトリ */
  output: string;
}

/** 文書の並び順 */
export type DocumentOrder = 'name' | 'filesystem';

export interface DocumentsConfig {
  /** 文書ファイルの拡張子 */
  extension: string;
  /** 出力ファイルの拡張子 */
  outputExtension: string;
  /** 並び順（name: ファイル名順, filesystem: 列挙順のまま） */
  order: DocumentOrder;
}

export interface IndexConfig {
  /** インデックスページのテンプレート名 */
  template: string;
}

/** メタデータブロックの形式 */
export type MetadataFormat = 'meta' | 'frontmatter';

export interface MarkdownConfig {
  /** メタデータブロックの形式 */
  metadata: MetadataFormat;
  /** GitHub Flavored Markdownを有効にするか */
  gfm: boolean;
  /** 単一改行を<br>にするか */
  breaks: boolean;
}

/** 解析できない日付の扱い */
export type InvalidDatePolicy = 'fail' | 'warn';

export interface DatesConfig {
  /** fail: ビルドを中断, warn: 警告して日付なしで続行 */
  onInvalid: InvalidDatePolicy;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggingConfig {
  level: LogLevel;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: SiteConfig = {
  version: '1.0',
  paths: {
    markdowns: 'src/markdowns',
    templates: 'src/templates',
    static: 'src/static',
    output: 'build',
  },
  documents: {
    extension: '.md',
    outputExtension: '.html',
    order: 'name',
  },
  index: {
    template: 'index.html',
  },
  markdown: {
    metadata: 'meta',
    gfm: true,
    breaks: false,
  },
  dates: {
    onInvalid: 'fail',
  },
  logging: {
    level: 'info',
  },
};
