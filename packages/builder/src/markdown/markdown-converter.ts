import { Marked } from 'marked';
import type { MetadataMap } from '@sitegen/types';
import { MetaBlockParser, type MetadataParser } from './metadata-parser.js';

export interface MarkdownConverterOptions {
  /** メタデータパーサ（デフォルト: MetaBlockParser） */
  metadataParser?: MetadataParser;
  /** GitHub Flavored Markdown（デフォルト: true） */
  gfm?: boolean;
  /** 単一改行を<br>にする（デフォルト: false） */
  breaks?: boolean;
}

export interface ConversionResult {
  /** 変換後のHTML */
  html: string;
  /** 文書先頭のメタデータ */
  metadata: MetadataMap;
}

/**
 * Markdown → HTML 変換
 * メタデータブロックを取り除いてから本文を変換する
 */
export class MarkdownConverter {
  private metadataParser: MetadataParser;
  private marked: Marked;

  constructor(options: MarkdownConverterOptions = {}) {
    this.metadataParser = options.metadataParser ?? new MetaBlockParser();
    this.marked = new Marked({
      gfm: options.gfm ?? true,
      breaks: options.breaks ?? false,
    });
  }

  convert(source: string): ConversionResult {
    const { metadata, body } = this.metadataParser.parse(source);
    return {
      html: this.render(body),
      metadata,
    };
  }

  /**
   * メタデータを解釈せずに本文のみ変換
   */
  render(markdown: string): string {
    const html = this.marked.parse(markdown, { async: false });
    if (typeof html !== 'string') {
      throw new Error('Markdown conversion unexpectedly returned a Promise');
    }
    return html;
  }
}
