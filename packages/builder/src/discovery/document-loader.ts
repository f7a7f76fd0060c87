import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { DocumentOrder, SourceDocument } from '@sitegen/types';

export interface DocumentLoaderOptions {
  /** Markdown文書のディレクトリ */
  markdownDir: string;
  /** 文書ファイルの拡張子（例: .md） */
  extension: string;
  /** 並び順 */
  order: DocumentOrder;
}

/**
 * 文書ローダー
 * ディレクトリ直下の文書ファイルを列挙し、内容を読み込む
 */
export class DocumentLoader {
  private markdownDir: string;
  private extension: string;
  private order: DocumentOrder;

  constructor(options: DocumentLoaderOptions) {
    this.markdownDir = path.resolve(options.markdownDir);
    this.extension = options.extension;
    this.order = options.order;
  }

  /**
   * 列挙に使うglobパターン（ログ出力用にも公開）
   */
  get pattern(): string {
    return `*${this.extension}`;
  }

  /**
   * 文書ファイルを列挙
   * ディレクトリが存在しない場合は空配列を返す
   */
  async findDocuments(): Promise<SourceDocument[]> {
    const files = await fg(this.pattern, {
      cwd: this.markdownDir,
      absolute: false,
      onlyFiles: true,
      dot: false,
      deep: 1,
    });

    if (this.order === 'name') {
      // ロケールに依存しないコード単位順
      files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }

    return files.map((file) => ({
      path: path.join(this.markdownDir, file),
      name: path.basename(file, this.extension),
    }));
  }

  /**
   * 文書の内容を読み込む
   */
  async readDocument(source: SourceDocument): Promise<string> {
    return fs.readFile(source.path, 'utf-8');
  }
}
