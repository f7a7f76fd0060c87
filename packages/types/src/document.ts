/**
 * 文書データの型定義
 */

/**
 * ローダーが列挙したソース文書
 */
export interface SourceDocument {
  /** ソースファイルの絶対パス */
  path: string;
  /** 拡張子を除いたファイル名（出力ファイル名に使用） */
  name: string;
}

/**
 * メタデータブロックの内容
 * キーは小文字化され、同じキーの値は宣言順にすべて保持される
 */
export type MetadataMap = Record<string, string[]>;

/**
 * 変換済み文書（1ソースファイルにつき1つ、生成後は不変）
 */
export interface Document {
  /** ソースの短縮名 */
  readonly name: string;
  /** タイトル（メタデータに宣言がなければundefined） */
  readonly title?: string;
  /** 日付（メタデータに宣言がなければundefined） */
  readonly date?: Date;
  /** 変換後のHTML本文 */
  readonly body: string;
}
