/**
 * サイトビルダー
 *
 * 1回の実行で以下を順に行う:
 * 1. 文書の列挙
 * 2. 各文書の変換（メタデータ抽出・日付解析）とページ書き込み
 * 3. 全文書を渡してインデックスを生成
 * 4. 静的ファイルのコピー
 *
 * エラーは捕捉せずに呼び出し元へ伝播する。失敗前に書き込んだファイルは残る。
 */

import * as path from 'path';
import type { Document, SiteConfig, SourceDocument } from '@sitegen/types';
import { DocumentLoader } from '../discovery/document-loader.js';
import { MarkdownConverter } from '../markdown/markdown-converter.js';
import {
  createMetadataParser,
  firstValue,
  type MetadataParser,
} from '../markdown/metadata-parser.js';
import { DateParseError, parseDate } from '../date/date-normalizer.js';
import { OutputWriter } from '../output/output-writer.js';
import { IndexRenderer } from '../render/index-renderer.js';
import { StaticAssetCopier } from '../assets/static-asset-copier.js';
import type { Logger } from '../logger.js';

export interface SiteBuilderOptions {
  config: SiteConfig;
  /** 設定内の相対パスの基準ディレクトリ */
  projectRoot: string;
  logger: Logger;
  /** メタデータパーサ（省略時はconfig.markdown.metadataから生成） */
  metadataParser?: MetadataParser;
}

export interface BuildResult {
  /** 読み込み順の文書一覧 */
  documents: Document[];
  /** 書き込んだ文書ページのパス */
  pagePaths: string[];
  /** インデックスのパス */
  indexPath: string;
  /** コピーした静的ファイル名 */
  assets: string[];
}

export class SiteBuilder {
  private config: SiteConfig;
  private logger: Logger;
  private loader: DocumentLoader;
  private converter: MarkdownConverter;
  private writer: OutputWriter;
  private renderer: IndexRenderer;
  private copier: StaticAssetCopier;

  constructor(options: SiteBuilderOptions) {
    const { config, projectRoot, logger } = options;
    const resolvePath = (p: string): string => path.resolve(projectRoot, p);

    this.config = config;
    this.logger = logger;
    this.loader = new DocumentLoader({
      markdownDir: resolvePath(config.paths.markdowns),
      extension: config.documents.extension,
      order: config.documents.order,
    });
    this.converter = new MarkdownConverter({
      metadataParser: options.metadataParser ?? createMetadataParser(config.markdown.metadata),
      gfm: config.markdown.gfm,
      breaks: config.markdown.breaks,
    });
    this.writer = new OutputWriter({
      outputDir: resolvePath(config.paths.output),
      outputExtension: config.documents.outputExtension,
    });
    this.renderer = new IndexRenderer({
      templateDir: resolvePath(config.paths.templates),
      templateName: config.index.template,
    });
    this.copier = new StaticAssetCopier({
      staticDir: resolvePath(config.paths.static),
      writer: this.writer,
    });
  }

  async build(): Promise<BuildResult> {
    this.logger.info('Starting');

    const sources = await this.loader.findDocuments();
    if (sources.length === 0) {
      this.logger.warn(
        `No files found matching ${path.join(this.config.paths.markdowns, this.loader.pattern)}`
      );
    }

    await this.writer.ensureOutputDir();

    this.logger.info('Rendering markdown files...');
    const documents: Document[] = [];
    const pagePaths: string[] = [];
    for (const source of sources) {
      const document = await this.processDocument(source);
      pagePaths.push(await this.writer.writeDocument(document.name, document.body));
      documents.push(document);
    }

    this.logger.info('Rendering index...');
    const indexPath = await this.writer.writeIndex(this.renderer.render(documents));

    this.logger.info('Copying static assets...');
    const assets = await this.copier.copyAll();
    this.logger.debug(`Copied ${assets.length} static file(s)`);

    this.logger.info('Finishing');
    return { documents, pagePaths, indexPath, assets };
  }

  /**
   * 1文書を読み込んで変換
   */
  private async processDocument(source: SourceDocument): Promise<Document> {
    this.logger.debug(`Converting ${source.path}`);

    const content = await this.loader.readDocument(source);
    const { html, metadata } = this.converter.convert(content);

    return Object.freeze({
      name: source.name,
      title: firstValue(metadata, 'title'),
      date: this.normalizeDate(source, firstValue(metadata, 'date')),
      body: html,
    });
  }

  /**
   * 日付を解析（空の宣言は未宣言として扱う）
   * dates.onInvalid が warn の場合のみ解析失敗を警告に格下げする
   */
  private normalizeDate(source: SourceDocument, value: string | undefined): Date | undefined {
    if (!value || value.trim() === '') {
      return undefined;
    }

    try {
      return parseDate(value);
    } catch (error) {
      if (error instanceof DateParseError && this.config.dates.onInvalid === 'warn') {
        this.logger.warn(`${error.message} in ${source.path}; ignoring date`);
        return undefined;
      }
      throw error;
    }
  }
}
