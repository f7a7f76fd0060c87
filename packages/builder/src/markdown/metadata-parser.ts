/**
 * メタデータブロックのパーサ
 *
 * 文書先頭のメタデータを取り出し、残りの本文と分離する。
 * MarkdownConverterはMetadataParserインターフェイスにのみ依存するため、
 * 独自形式のパーサに差し替えられる。
 */

import { parse as parseYaml } from 'yaml';
import type { MetadataFormat, MetadataMap } from '@sitegen/types';

export interface MetadataParseResult {
  /** 抽出したメタデータ */
  metadata: MetadataMap;
  /** メタデータブロックを除いた本文 */
  body: string;
}

export interface MetadataParser {
  parse(source: string): MetadataParseResult;
}

const META_RE = /^[ ]{0,3}([A-Za-z0-9_-]+):\s*(.*)$/;
const META_MORE_RE = /^[ ]{4,}(.*)$/;
const BEGIN_RE = /^-{3}(\s.*)?$/;
const END_RE = /^(-{3}|\.{3})(\s.*)?$/;

/**
 * `key: value` 形式のメタデータブロック
 *
 * - 空行（消費される）、または `---` / `...` でブロック終了
 * - 先頭の `---` は省略可能
 * - 4スペース以上インデントされた行は直前のキーの値を追加
 * - 同じキーが繰り返された場合は値を追加
 * - キーは小文字化
 */
export class MetaBlockParser implements MetadataParser {
  parse(source: string): MetadataParseResult {
    const lines = source.split(/\r?\n/);
    const metadata: MetadataMap = {};
    let index = 0;
    let currentKey: string | null = null;

    if (lines.length > 0 && BEGIN_RE.test(lines[0])) {
      index++;
    }

    while (index < lines.length) {
      const line = lines[index];

      if (line.trim() === '' || END_RE.test(line)) {
        index++;
        break;
      }

      const meta = META_RE.exec(line);
      if (meta) {
        currentKey = meta[1].toLowerCase();
        const values = metadata[currentKey] ?? [];
        values.push(meta[2].trim());
        metadata[currentKey] = values;
        index++;
        continue;
      }

      const more = META_MORE_RE.exec(line);
      if (more && currentKey !== null) {
        metadata[currentKey].push(more[1].trim());
        index++;
        continue;
      }

      // メタデータ以外の行は本文として残す
      break;
    }

    return {
      metadata,
      body: lines.slice(index).join('\n'),
    };
  }
}

/**
 * `---` で囲まれたYAMLフロントマター
 */
export class FrontmatterParser implements MetadataParser {
  parse(source: string): MetadataParseResult {
    const lines = source.split(/\r?\n/);

    if (lines.length === 0 || lines[0].trim() !== '---') {
      return { metadata: {}, body: source };
    }

    const end = lines.findIndex((line, i) => i > 0 && line.trim() === '---');
    if (end === -1) {
      // 閉じ区切りがなければフロントマターとして扱わない
      return { metadata: {}, body: source };
    }

    const parsed: unknown = parseYaml(lines.slice(1, end).join('\n'));
    const metadata: MetadataMap = {};

    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        metadata[key.toLowerCase()] = toValueList(value);
      }
    }

    return {
      metadata,
      body: lines.slice(end + 1).join('\n'),
    };
  }
}

function toValueList(value: unknown): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item) => toValueList(item));
  }
  if (value instanceof Date) {
    return [value.toISOString()];
  }
  if (typeof value === 'object') {
    return [JSON.stringify(value)];
  }
  return [String(value)];
}

/**
 * 設定値からパーサを生成
 */
export function createMetadataParser(format: MetadataFormat): MetadataParser {
  switch (format) {
    case 'meta':
      return new MetaBlockParser();
    case 'frontmatter':
      return new FrontmatterParser();
  }
}

/**
 * キーの最初の値を取得（宣言がなければundefined）
 */
export function firstValue(metadata: MetadataMap, key: string): string | undefined {
  return metadata[key]?.[0];
}
