/**
 * インデックスページのレンダリング
 */

import nunjucks from 'nunjucks';
import type { Environment } from 'nunjucks';
import { format as formatDate, isValid } from 'date-fns';
import type { Document } from '@sitegen/types';

export interface IndexRendererOptions {
  /** テンプレートディレクトリ */
  templateDir: string;
  /** インデックスのテンプレート名 */
  templateName: string;
}

/**
 * テンプレートから見た文書（`html` は `body` の別名）
 */
export interface IndexEntry extends Document {
  readonly html: string;
}

/**
 * 文書一覧をテンプレートに渡してインデックスを生成する
 *
 * 読み込み順の文書一覧を `documents` と `post_list` の両方の名前で渡す。
 * 出力は自動エスケープされるため、本文HTMLをそのまま出すには `| safe` を使う。
 * 日付は `| date` を通して出力する。
 */
export class IndexRenderer {
  private environment: Environment;
  private templateName: string;

  constructor(options: IndexRendererOptions) {
    this.templateName = options.templateName;
    this.environment = new nunjucks.Environment(
      new nunjucks.FileSystemLoader(options.templateDir, { noCache: true }),
      { autoescape: true }
    );
    this.environment.addFilter('date', dateFilter);
  }

  /**
   * インデックスを生成
   * @throws テンプレートが存在しない場合（template not found）
   */
  render(documents: readonly Document[]): string {
    const entries = documents.map(toIndexEntry);
    return this.environment.render(this.templateName, { documents: entries, post_list: entries });
  }
}

function toIndexEntry(document: Document): IndexEntry {
  return Object.freeze({ ...document, html: document.body });
}

/**
 * `{{ doc.date | date("yyyy-MM-dd") }}`
 * 日付以外（未宣言の日付を含む）は空文字
 */
function dateFilter(value: unknown, pattern: string = 'yyyy-MM-dd HH:mm:ss'): string {
  if (!(value instanceof Date) || !isValid(value)) {
    return '';
  }
  return formatDate(value, pattern);
}
