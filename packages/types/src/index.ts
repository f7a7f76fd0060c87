/**
 * @sitegen/types
 * sitegenの共通型定義
 */

// Document
export type { Document, SourceDocument, MetadataMap } from './document.js';

// Config
export type {
  SiteConfig,
  PathsConfig,
  DocumentsConfig,
  DocumentOrder,
  IndexConfig,
  MarkdownConfig,
  MetadataFormat,
  DatesConfig,
  InvalidDatePolicy,
  LoggingConfig,
  LogLevel,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  validateConfig,
  type PartialSiteConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './config/index.js';
