/**
 * build コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { runBuild, executeBuild } from '../build.js';

describe('build command', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(tmpdir(), 'sitegen-build-command-'));
    await fs.mkdir(path.join(root, 'src', 'markdowns'), { recursive: true });
    await fs.mkdir(path.join(root, 'src', 'templates'), { recursive: true });
    await fs.mkdir(path.join(root, 'src', 'static'), { recursive: true });
    await fs.writeFile(
      path.join(root, 'src', 'templates', 'index.html'),
      '{% for doc in documents %}<a href="{{ doc.name }}.html">{{ doc.title }}</a>{% endfor %}'
    );
    await fs.writeFile(path.join(root, '.sitegen.json'), JSON.stringify({ version: '1.0' }));
    vi.stubEnv('SITEGEN_CONFIG', '');
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('runBuild', () => {
    it('プロジェクトルートの設定でビルドする', async () => {
      await fs.writeFile(path.join(root, 'src', 'markdowns', 'hello.md'), 'title: Hello\n\nHi');

      const result = await runBuild({ root, quiet: true });

      const buildDir = path.join(await fs.realpath(root), 'build');
      expect(result.indexPath).toBe(path.join(buildDir, 'index.html'));
      expect(await fs.readFile(result.indexPath, 'utf-8')).toBe('<a href="hello.html">Hello</a>');
      expect(await fs.readFile(path.join(buildDir, 'hello.html'), 'utf-8')).toBe('<p>Hi</p>\n');
    });

    it('--on-invalid-date warn で日付エラーを警告にする', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      await fs.writeFile(
        path.join(root, 'src', 'markdowns', 'odd.md'),
        'title: Odd\ndate: someday\n\nBody'
      );

      const result = await runBuild({ root, quiet: true, onInvalidDate: 'warn' });

      expect(result.documents[0].date).toBeUndefined();
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('明示した設定ファイルを使う', async () => {
      await fs.writeFile(
        path.join(root, 'custom.json'),
        JSON.stringify({ paths: { output: 'out' } })
      );

      const result = await runBuild({ root, config: 'custom.json', quiet: true });

      expect(result.indexPath).toBe(path.join(await fs.realpath(root), 'out', 'index.html'));
    });
  });

  describe('executeBuild', () => {
    it('成功時は終了コードを設定しない', async () => {
      await executeBuild({ root, quiet: true });

      expect(process.exitCode).toBeUndefined();
    });

    it('解析できない日付で終了コード1', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      await fs.writeFile(
        path.join(root, 'src', 'markdowns', 'bad.md'),
        'date: not-a-date\n\nBody'
      );

      await executeBuild({ root, quiet: true });

      expect(process.exitCode).toBe(1);
      expect(error).toHaveBeenCalledWith('エラー: Unable to parse date: "not-a-date"');
    });

    it('テンプレートがなければ終了コード1', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      await fs.rm(path.join(root, 'src', 'templates', 'index.html'));

      await executeBuild({ root, quiet: true });

      expect(process.exitCode).toBe(1);
      expect(error).toHaveBeenCalledWith('Build failed:', expect.any(Error));
    });
  });
});
