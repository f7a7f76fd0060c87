import fg from 'fast-glob';
import { promises as fs } from 'node:fs';
import { join, resolve } from 'node:path';
import type { OutputWriter } from '../output/output-writer.js';

export interface StaticAssetCopierOptions {
  /** 静的ファイルのディレクトリ */
  staticDir: string;
  /** コピー先（出力ディレクトリ） */
  writer: OutputWriter;
}

/**
 * 静的ファイルのコピー
 *
 * ディレクトリ直下のエントリを拡張子に関係なくそのままコピーする。
 * ドットで始まるエントリは文書ローダーと同じく対象外。
 * サブディレクトリは展開しない（copyFileが失敗する）。
 * ディレクトリが存在しない場合もエラー。
 */
export class StaticAssetCopier {
  private staticDir: string;
  private writer: OutputWriter;

  constructor(options: StaticAssetCopierOptions) {
    this.staticDir = resolve(options.staticDir);
    this.writer = options.writer;
  }

  /**
   * すべてのエントリをコピー
   * @returns コピーしたファイル名（名前順）
   */
  async copyAll(): Promise<string[]> {
    // fast-globは存在しないcwdを空として扱うため先に確認する
    await fs.stat(this.staticDir);

    const entries = (
      await fg('*', {
        cwd: this.staticDir,
        onlyFiles: false,
        dot: false,
        deep: 1,
      })
    ).sort();

    for (const entry of entries) {
      await fs.copyFile(join(this.staticDir, entry), this.writer.resolvePath(entry));
    }

    return entries;
  }
}
