/**
 * @sitegen/builder
 *
 * 静的サイト生成パイプライン
 */

export { SiteBuilder, type SiteBuilderOptions, type BuildResult } from './builder/site-builder.js';
export { DocumentLoader, type DocumentLoaderOptions } from './discovery/document-loader.js';
export {
  MarkdownConverter,
  type MarkdownConverterOptions,
  type ConversionResult,
} from './markdown/markdown-converter.js';
export {
  MetaBlockParser,
  FrontmatterParser,
  createMetadataParser,
  firstValue,
  type MetadataParser,
  type MetadataParseResult,
} from './markdown/metadata-parser.js';
export { parseDate, DateParseError, DATE_FORMATS } from './date/date-normalizer.js';
export { OutputWriter, PathTraversalError, type OutputWriterOptions } from './output/output-writer.js';
export { IndexRenderer, type IndexRendererOptions, type IndexEntry } from './render/index-renderer.js';
export { StaticAssetCopier, type StaticAssetCopierOptions } from './assets/static-asset-copier.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';
