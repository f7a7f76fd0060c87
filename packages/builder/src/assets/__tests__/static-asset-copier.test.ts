import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { StaticAssetCopier } from '../static-asset-copier.js';
import { OutputWriter } from '../../output/output-writer.js';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0xff]);

describe('StaticAssetCopier', () => {
  let testDir: string;
  let staticDir: string;
  let outputDir: string;
  let writer: OutputWriter;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(join(tmpdir(), 'sitegen-static-test-'));
    staticDir = join(testDir, 'static');
    outputDir = join(testDir, 'build');
    await fs.mkdir(staticDir, { recursive: true });
    writer = new OutputWriter({ outputDir, outputExtension: '.html' });
    await writer.ensureOutputDir();
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('ファイルをバイト単位でそのままコピーする', async () => {
    await fs.writeFile(join(staticDir, 'logo.png'), PNG_BYTES);
    const copier = new StaticAssetCopier({ staticDir, writer });

    const copied = await copier.copyAll();

    expect(copied).toEqual(['logo.png']);
    expect(await fs.readdir(outputDir)).toEqual(['logo.png']);
    expect(Buffer.compare(await fs.readFile(join(outputDir, 'logo.png')), PNG_BYTES)).toBe(0);
  });

  it('拡張子で絞り込まずにすべてコピーする', async () => {
    await fs.writeFile(join(staticDir, 'style.css'), 'body {}');
    await fs.writeFile(join(staticDir, 'robots.txt'), 'User-agent: *');
    const copier = new StaticAssetCopier({ staticDir, writer });

    const copied = await copier.copyAll();

    expect(copied).toEqual(['robots.txt', 'style.css']);
    expect(await fs.readFile(join(outputDir, 'style.css'), 'utf-8')).toBe('body {}');
  });

  it('ドットで始まるファイルはコピーしない', async () => {
    await fs.writeFile(join(staticDir, 'style.css'), 'body {}');
    await fs.writeFile(join(staticDir, '.DS_Store'), '');
    await fs.writeFile(join(staticDir, '.gitkeep'), '');
    const copier = new StaticAssetCopier({ staticDir, writer });

    const copied = await copier.copyAll();

    expect(copied).toEqual(['style.css']);
    expect(await fs.readdir(outputDir)).toEqual(['style.css']);
  });

  it('既存ファイルを上書きする', async () => {
    await fs.writeFile(join(outputDir, 'style.css'), 'old');
    await fs.writeFile(join(staticDir, 'style.css'), 'new');
    const copier = new StaticAssetCopier({ staticDir, writer });

    await copier.copyAll();

    expect(await fs.readFile(join(outputDir, 'style.css'), 'utf-8')).toBe('new');
  });

  it('空のディレクトリでは何もコピーしない', async () => {
    const copier = new StaticAssetCopier({ staticDir, writer });

    expect(await copier.copyAll()).toEqual([]);
  });

  it('ディレクトリが存在しなければエラー', async () => {
    const copier = new StaticAssetCopier({ staticDir: join(testDir, 'missing'), writer });

    await expect(copier.copyAll()).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('サブディレクトリはコピーできずエラー', async () => {
    await fs.mkdir(join(staticDir, 'images'));
    const copier = new StaticAssetCopier({ staticDir, writer });

    await expect(copier.copyAll()).rejects.toThrow();
  });
});
