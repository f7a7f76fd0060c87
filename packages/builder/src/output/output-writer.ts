/**
 * 出力ディレクトリへの書き込み
 */

import { promises as fs } from 'node:fs';
import { resolve, sep } from 'node:path';

export interface OutputWriterOptions {
  /** 出力ディレクトリ */
  outputDir: string;
  /** 出力ファイルの拡張子（例: .html） */
  outputExtension: string;
}

/**
 * 出力ディレクトリの外を指すファイル名
 */
export class PathTraversalError extends Error {
  constructor(
    public readonly fileName: string,
    public readonly outputDir: string
  ) {
    super(`Refusing to write "${fileName}" outside of output directory ${outputDir}`);
    this.name = 'PathTraversalError';
  }
}

export class OutputWriter {
  private outputDir: string;
  private outputExtension: string;

  constructor(options: OutputWriterOptions) {
    this.outputDir = resolve(options.outputDir);
    this.outputExtension = options.outputExtension;
  }

  /**
   * 出力ディレクトリを作成（既存なら何もしない）
   */
  async ensureOutputDir(): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
  }

  /**
   * 文書ページを書き込む（既存ファイルは上書き）
   * @returns 書き込んだファイルのパス
   */
  async writeDocument(name: string, html: string): Promise<string> {
    return this.write(`${name}${this.outputExtension}`, html);
  }

  /**
   * インデックスページを書き込む
   * @returns 書き込んだファイルのパス
   */
  async writeIndex(html: string): Promise<string> {
    return this.write(`index${this.outputExtension}`, html);
  }

  /**
   * 出力ディレクトリ内のパスを取得
   * @throws PathTraversalError 出力ディレクトリの外を指す場合
   */
  resolvePath(fileName: string): string {
    const filePath = resolve(this.outputDir, fileName);
    if (!filePath.startsWith(this.outputDir + sep)) {
      throw new PathTraversalError(fileName, this.outputDir);
    }
    return filePath;
  }

  private async write(fileName: string, content: string): Promise<string> {
    const filePath = this.resolvePath(fileName);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }
}
