import type { SiteConfig } from '../config.js';

type ConfigRecord = Record<string, unknown>;

/**
 * 設定ファイルから読み込んだ部分設定（各セクションのキーも省略可能）
 */
export type PartialSiteConfig = {
  [K in keyof SiteConfig]?: SiteConfig[K] extends object ? Partial<SiteConfig[K]> : SiteConfig[K];
};

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: unknown, options: readonly T[]): value is T {
  return options.some((option) => option === value);
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): PartialSiteConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  const result: PartialSiteConfig = {};

  // バージョンのチェック
  const version = config.version;
  if (version !== undefined) {
    if (typeof version !== 'string') {
      throw new Error('config.version must be a string');
    }
    result.version = version;
  }

  if (config.paths !== undefined) {
    result.paths = validatePathsConfig(config.paths);
  }

  if (config.documents !== undefined) {
    result.documents = validateDocumentsConfig(config.documents);
  }

  if (config.index !== undefined) {
    result.index = validateIndexConfig(config.index);
  }

  if (config.markdown !== undefined) {
    result.markdown = validateMarkdownConfig(config.markdown);
  }

  if (config.dates !== undefined) {
    result.dates = validateDatesConfig(config.dates);
  }

  if (config.logging !== undefined) {
    result.logging = validateLoggingConfig(config.logging);
  }

  return result;
}

function validatePathsConfig(paths: unknown): Partial<SiteConfig['paths']> {
  if (!isRecord(paths)) {
    throw new Error('config.paths must be an object');
  }

  const result: Partial<SiteConfig['paths']> = {};
  for (const key of ['markdowns', 'templates', 'static', 'output'] as const) {
    const value = paths[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string' || value.length === 0) {
      throw new Error(`config.paths.${key} must be a non-empty string`);
    }
    result[key] = value;
  }

  return result;
}

function validateDocumentsConfig(
  documents: unknown
): Partial<SiteConfig['documents']> {
  if (!isRecord(documents)) {
    throw new Error('config.documents must be an object');
  }

  const result: Partial<SiteConfig['documents']> = {};

  for (const key of ['extension', 'outputExtension'] as const) {
    const value = documents[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string' || !value.startsWith('.')) {
      throw new Error(`config.documents.${key} must be a string starting with "."`);
    }
    result[key] = value;
  }

  const order = documents.order;
  if (order !== undefined) {
    if (!isOneOf(order, ['name', 'filesystem'] as const)) {
      throw new Error('config.documents.order must be "name" or "filesystem"');
    }
    result.order = order;
  }

  return result;
}

function validateIndexConfig(index: unknown): Partial<SiteConfig['index']> {
  if (!isRecord(index)) {
    throw new Error('config.index must be an object');
  }

  const template = index.template;
  if (template === undefined) {
    return {};
  }

  if (typeof template !== 'string' || template.length === 0) {
    throw new Error('config.index.template must be a non-empty string');
  }

  return { template };
}

function validateMarkdownConfig(
  markdown: unknown
): Partial<SiteConfig['markdown']> {
  if (!isRecord(markdown)) {
    throw new Error('config.markdown must be an object');
  }

  const result: Partial<SiteConfig['markdown']> = {};

  const metadata = markdown.metadata;
  if (metadata !== undefined) {
    if (!isOneOf(metadata, ['meta', 'frontmatter'] as const)) {
      throw new Error('config.markdown.metadata must be "meta" or "frontmatter"');
    }
    result.metadata = metadata;
  }

  for (const key of ['gfm', 'breaks'] as const) {
    const value = markdown[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'boolean') {
      throw new Error(`config.markdown.${key} must be a boolean`);
    }
    result[key] = value;
  }

  return result;
}

function validateDatesConfig(dates: unknown): Partial<SiteConfig['dates']> {
  if (!isRecord(dates)) {
    throw new Error('config.dates must be an object');
  }

  const onInvalid = dates.onInvalid;
  if (onInvalid === undefined) {
    return {};
  }

  if (!isOneOf(onInvalid, ['fail', 'warn'] as const)) {
    throw new Error('config.dates.onInvalid must be "fail" or "warn"');
  }

  return { onInvalid };
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

function validateLoggingConfig(logging: unknown): Partial<SiteConfig['logging']> {
  if (!isRecord(logging)) {
    throw new Error('config.logging must be an object');
  }

  const level = logging.level;
  if (level === undefined) {
    return {};
  }

  if (!isOneOf(level, LOG_LEVELS)) {
    throw new Error(`config.logging.level must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  return { level };
}
