import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { scanFilesystem } from '../scanner.js';
import { findFolderByCode, resolvePath } from '../path-resolver.js';
import type { JdIndex } from '../models.js';
import { createDirs, createTempRoot, removeTempRoot } from './helpers/fixture.js';

describe('resolvePath', () => {
  let root: string;
  let index: JdIndex;

  beforeEach(async () => {
    root = await createTempRoot('jdex-resolver-test');
    await createDirs(root, [
      '10-19 Life admin/11 Me/11.01 Inbox',
      '10-19 Life admin/11 Me/11.10 ■ Health',
      '10-19 Life admin/11 Me/11.11 Checkups',
      '20-29 Work/21 Projects/21.01 Roadmap',
    ]);
    index = await scanFilesystem(root);
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('エリアのパスを解決できる', async () => {
    expect(await resolvePath('10-19', index, root)).toBe(join(root, '10-19 Life admin'));
  });

  it('カテゴリのパスを解決できる', async () => {
    expect(await resolvePath('21', index, root)).toBe(join(root, '20-29 Work', '21 Projects'));
  });

  it('IDのパスを解決できる', async () => {
    expect(await resolvePath('11.11', index, root)).toBe(
      join(root, '10-19 Life admin', '11 Me', '11.11 Checkups')
    );
  });

  it('インデックスにないコードはnullを返す', async () => {
    expect(await resolvePath('30-39', index, root)).toBeNull();
    expect(await resolvePath('31', index, root)).toBeNull();
    expect(await resolvePath('11.02', index, root)).toBeNull();
  });

  it('セクション見出しはパスを持たない', async () => {
    expect(await resolvePath('11.10', index, root)).toBeNull();
  });

  it('インデックス構築後に削除されたフォルダはnullを返す', async () => {
    await fs.rm(join(root, '10-19 Life admin', '11 Me', '11.01 Inbox'), { recursive: true });

    await expect(resolvePath('11.01', index, root)).resolves.toBeNull();
  });

  it('途中の階層が消えた場合もnullを返す', async () => {
    await fs.rm(join(root, '20-29 Work'), { recursive: true });

    expect(await resolvePath('20-29', index, root)).toBeNull();
    expect(await resolvePath('21', index, root)).toBeNull();
    expect(await resolvePath('21.01', index, root)).toBeNull();
  });

  it('フォルダ名の変更は次の解決で反映される', async () => {
    const categoryDir = join(root, '10-19 Life admin', '11 Me');
    await fs.rename(join(categoryDir, '11.11 Checkups'), join(categoryDir, '11.11 Annual checkups'));

    expect(await resolvePath('11.11', index, root)).toBe(join(categoryDir, '11.11 Annual checkups'));
  });

  it('ルートが存在しない場合はnullを返す', async () => {
    expect(await resolvePath('10-19', index, join(root, 'missing'))).toBeNull();
  });

  it('カテゴリフォルダが同名のファイルに置き換わった場合はnullを返す', async () => {
    const categoryPath = join(root, '10-19 Life admin', '11 Me');
    await fs.rm(categoryPath, { recursive: true });
    await fs.writeFile(categoryPath, 'file');

    expect(await resolvePath('11', index, root)).toBeNull();
    expect(await resolvePath('11.01', index, root)).toBeNull();
  });

  it('カテゴリフォルダがリンク切れのシンボリックリンクの場合はnullを返す', async () => {
    const categoryPath = join(root, '10-19 Life admin', '11 Me');
    await fs.rm(categoryPath, { recursive: true });
    await fs.symlink(join(root, 'missing'), categoryPath);

    expect(await resolvePath('11', index, root)).toBeNull();
    expect(await resolvePath('11.01', index, root)).toBeNull();
  });

  it('読めないカテゴリフォルダの中のIDはnullを返す', async () => {
    // rootはパーミッションに関係なく読めるため対象外
    if (process.getuid?.() === 0) {
      return;
    }

    const categoryPath = join(root, '10-19 Life admin', '11 Me');
    await fs.chmod(categoryPath, 0o000);

    try {
      expect(await resolvePath('11', index, root)).toBe(categoryPath);
      expect(await resolvePath('11.01', index, root)).toBeNull();
    } finally {
      await fs.chmod(categoryPath, 0o755);
    }
  });
});

describe('findFolderByCode', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempRoot('jdex-find-folder-test');
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('コード + 空白で始まるフォルダのみ一致する', async () => {
    await createDirs(root, ['11.012 Not this', '11.01 Inbox (old)']);

    expect(await findFolderByCode(root, '11.01')).toBe(join(root, '11.01 Inbox (old)'));
  });

  it('ファイルは対象外', async () => {
    await fs.writeFile(join(root, '11 Notes'), 'file');

    expect(await findFolderByCode(root, '11')).toBeNull();
  });

  it('複数一致する場合は名前順で最初のものを返す', async () => {
    await createDirs(root, ['11 Me (b)', '11 Me (a)']);

    expect(await findFolderByCode(root, '11')).toBe(join(root, '11 Me (a)'));
  });
});
