import { describe, it, expect } from 'vitest';
import { MarkdownConverter } from '../markdown-converter.js';
import { FrontmatterParser } from '../metadata-parser.js';

describe('MarkdownConverter', () => {
  it('メタデータを除いて本文を変換する', () => {
    const converter = new MarkdownConverter();

    const result = converter.convert('title: Hello\ndate: 2024-01-15\n\n# Heading');

    expect(result.html).toBe('<h1>Heading</h1>\n');
    expect(result.metadata).toEqual({
      title: ['Hello'],
      date: ['2024-01-15'],
    });
  });

  it('メタデータがなければ全文をそのまま変換した結果と一致する', () => {
    const converter = new MarkdownConverter();
    const source = '# Hello\n\nWorld';

    const result = converter.convert(source);

    expect(result.html).toBe('<h1>Hello</h1>\n<p>World</p>\n');
    expect(result.html).toBe(converter.render(source));
    expect(result.metadata).toEqual({});
  });

  it('GFMはデフォルトで有効', () => {
    const converter = new MarkdownConverter();

    expect(converter.render('~~gone~~')).toBe('<p><del>gone</del></p>\n');
  });

  it('GFMを無効にできる', () => {
    const converter = new MarkdownConverter({ gfm: false });

    expect(converter.render('~~gone~~')).toBe('<p>~~gone~~</p>\n');
  });

  it('breaksで単一改行を<br>にする', () => {
    const converter = new MarkdownConverter({ breaks: true });

    expect(converter.render('line one\nline two')).toBe('<p>line one<br>line two</p>\n');
  });

  it('メタデータパーサを差し替えられる', () => {
    const converter = new MarkdownConverter({ metadataParser: new FrontmatterParser() });

    const result = converter.convert('---\ntitle: Front\n---\nSome *text*');

    expect(result.metadata).toEqual({ title: ['Front'] });
    expect(result.html).toBe('<p>Some <em>text</em></p>\n');
  });

  it('同じ入力に対して同じ出力を返す', () => {
    const converter = new MarkdownConverter();
    const source = 'title: Repeat\n\n- one\n- two';

    expect(converter.convert(source)).toEqual(converter.convert(source));
  });
});
