/**
 * 日付文字列の正規化
 *
 * 固定の書式に頼らず、ISO 8601と一般的な書式を順に試す。
 * 日付のみの値はローカルタイムの0時になる。
 */

import { isValid, parse, parseISO } from 'date-fns';

/**
 * 日付として解釈できない値
 */
export class DateParseError extends Error {
  constructor(public readonly value: string) {
    super(`Unable to parse date: "${value}"`);
    this.name = 'DateParseError';
  }
}

/**
 * ISO 8601以外に受け付ける書式（date-fnsのパターン、先に一致したものを採用）
 */
export const DATE_FORMATS: readonly string[] = [
  // 英語の月名
  'MMMM d, yyyy',
  'MMMM d yyyy',
  'MMMM do, yyyy',
  'MMMM d, yyyy h:mm a',
  'MMMM d, yyyy HH:mm',
  'MMM d, yyyy',
  'MMM d yyyy',
  'MMM. d, yyyy',
  'MMM do, yyyy',
  'd MMMM yyyy',
  'd MMM yyyy',
  'EEEE, MMMM d, yyyy',
  'EEE, MMM d, yyyy',
  'MMMM yyyy',
  // RFC 2822風（GMT/UTは +0000 に置き換えてから照合）
  'EEE, d MMM yyyy HH:mm:ss xx',
  'EEE, d MMM yyyy HH:mm xx',
  'd MMM yyyy HH:mm:ss xx',
  'EEE, d MMM yyyy HH:mm:ss',
  'd MMM yyyy HH:mm:ss',
  // 数字区切り
  'yyyy/M/d',
  'yyyy.M.d',
  'M/d/yyyy',
  // 先頭が12を超える場合のみ日が先
  'd/M/yyyy',
  'yyyy/M/d HH:mm',
  'yyyy/M/d HH:mm:ss',
  'yyyy-M-d HH:mm',
  'yyyy-M-d HH:mm:ss',
  'yyyy-M-d h:mm a',
  'yyyy-M-d HH:mm xx',
  'yyyy-M-d HH:mm:ss xx',
];

const UTC_SUFFIX = /\s(?:GMT|UTC|UT)$/i;

// 年以降の値はすべて書式側で与えられるため、基準日時は固定する
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * 日付文字列を解析
 * @throws DateParseError いずれの書式にも一致しない場合
 */
export function parseDate(value: string): Date {
  const text = value.trim().replace(UTC_SUFFIX, ' +0000');

  const iso = parseISO(text);
  if (isValid(iso)) {
    return iso;
  }

  for (const format of DATE_FORMATS) {
    const parsed = parse(text, format, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed;
    }
  }

  throw new DateParseError(value);
}
