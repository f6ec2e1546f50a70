import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { scanFilesystem } from '../scanner.js';
import { resolvePath } from '../path-resolver.js';
import { createDirs, createTempRoot, removeTempRoot } from './helpers/fixture.js';

describe('scanFilesystem', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempRoot('jdex-scanner-test');
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('3階層のフォルダからインデックスを構築できる', async () => {
    await createDirs(root, [
      '10-19 Life admin/11 Me/11.01 Inbox',
      '10-19 Life admin/11 Me/11.10 ■ Health',
      '10-19 Life admin/11 Me/11.11 Checkups',
      '10-19 Life admin/12 Home/12.01 Keys',
      '20-29 Work/21 Projects',
    ]);

    const index = await scanFilesystem(root);

    expect(index.count()).toEqual({ areas: 2, categories: 3, ids: 4 });
    expect(index.toData()).toEqual({
      areas: {
        '10-19': {
          name: '10-19 Life admin',
          categories: {
            '11': {
              name: '11 Me',
              ids: {
                '11.01': { name: '11.01 Inbox' },
                '11.10': { name: '11.10 ■ Health', section: true },
                '11.11': { name: '11.11 Checkups' },
              },
            },
            '12': { name: '12 Home', ids: { '12.01': { name: '12.01 Keys' } } },
          },
        },
        '20-29': {
          name: '20-29 Work',
          categories: { '21': { name: '21 Projects', ids: {} } },
        },
      },
    });
  });

  it('親子の参照が設定される', async () => {
    await createDirs(root, ['10-19 Life admin/11 Me/11.01 Inbox']);

    const index = await scanFilesystem(root);
    const inbox = index.getId('11.01');

    expect(inbox?.category?.code).toBe('11');
    expect(inbox?.category?.area?.code).toBe('10-19');
    expect(inbox?.category?.area?.index).toBe(index);
  });

  it('ルートが存在しない場合は空のインデックスを返す', async () => {
    const index = await scanFilesystem(join(root, 'missing'));
    expect(index.size).toBe(0);
  });

  it('形式に合わないフォルダとファイルは無視する', async () => {
    await createDirs(root, [
      'Downloads',
      '10-19 Life admin/Misc',
      '10-19 Life admin/11 Me/notes',
      '10-19 Life admin/11 Me/11.1 Typo',
    ]);
    await fs.writeFile(join(root, '20-29 Work'), 'a file, not a folder');
    await fs.writeFile(join(root, '10-19 Life admin', '11 Me', '11.02 Receipt'), 'file');

    const index = await scanFilesystem(root);

    expect(index.count()).toEqual({ areas: 1, categories: 1, ids: 0 });
  });

  it('階層が合わないフォルダは拾わない', async () => {
    await createDirs(root, [
      // ルート直下のカテゴリ・ID
      '11 Me',
      '11.01 Inbox',
      // エリア直下のID
      '10-19 Life admin/12.01 Keys',
      // IDの下のさらに深い階層
      '10-19 Life admin/11 Me/11.01 Inbox/13 Nested',
      '10-19 Life admin/11 Me/11.01 Inbox/11.02 Nested',
      // カテゴリの下のエリア
      '10-19 Life admin/11 Me/20-29 Work',
    ]);

    const index = await scanFilesystem(root);

    expect(index.count()).toEqual({ areas: 1, categories: 1, ids: 1 });
    expect(index.getId('11.01')?.name).toBe('11.01 Inbox');
    expect(index.getCategory('13')).toBeNull();
    expect(index.getId('12.01')).toBeNull();
  });

  it('同じコードのフォルダが複数ある場合は名前順で最初のものを採用する', async () => {
    await createDirs(root, [
      '10-19 Life admin/11 Me/11.01 Inbox old',
      '10-19 Life admin/11 Me/11.01 Inbox',
      '10-19 Life admin/11 Me (b)/11.02 Bills',
      '10-19 Life admin (b)/12 Home',
    ]);

    const index = await scanFilesystem(root);

    expect(index.count()).toEqual({ areas: 1, categories: 1, ids: 1 });
    expect(index.getArea('10-19')?.name).toBe('10-19 Life admin');
    expect(index.getCategory('11')?.name).toBe('11 Me');
    expect(index.getId('11.01')?.name).toBe('11.01 Inbox');
    expect(await resolvePath('11.01', index, root)).toBe(
      join(root, '10-19 Life admin', '11 Me', '11.01 Inbox')
    );
  });

  it('コードと同じ名前のファイルやリンク切れのシンボリックリンクは無視する', async () => {
    await createDirs(root, ['10-19 Life admin/11 Me/11.01 Inbox']);
    const areaPath = join(root, '10-19 Life admin');
    await fs.writeFile(join(areaPath, '12 Home'), 'file');
    await fs.symlink(join(root, 'missing'), join(areaPath, '13 Link'));

    const index = await scanFilesystem(root);

    expect(index.count()).toEqual({ areas: 1, categories: 1, ids: 1 });
    expect(index.getCategory('12')).toBeNull();
    expect(index.getCategory('13')).toBeNull();
  });

  it('読めないカテゴリフォルダは空のカテゴリとして扱う', async () => {
    // rootはパーミッションに関係なく読めるため対象外
    if (process.getuid?.() === 0) {
      return;
    }

    await createDirs(root, [
      '10-19 Life admin/11 Me/11.01 Inbox',
      '10-19 Life admin/12 Home/12.01 Keys',
    ]);
    const lockedPath = join(root, '10-19 Life admin', '11 Me');
    await fs.chmod(lockedPath, 0o000);

    try {
      const index = await scanFilesystem(root);

      expect(index.count()).toEqual({ areas: 1, categories: 2, ids: 1 });
      expect(index.getCategory('11')?.size).toBe(0);
      expect(index.getId('12.01')?.name).toBe('12.01 Keys');
    } finally {
      await fs.chmod(lockedPath, 0o755);
    }
  });

  it('除外パターンに一致するフォルダはスキップする', async () => {
    await createDirs(root, [
      '10-19 Life admin/11 Me/11.01 Inbox',
      '10-19 Life admin/11 Me/11.99 Archive',
      '90-99 Archive/91 Old/91.01 Stuff',
    ]);

    const index = await scanFilesystem(root, {
      exclude: ['90-99 *', '**/*.99 Archive'],
    });

    expect(index.count()).toEqual({ areas: 1, categories: 1, ids: 1 });
    expect(index.getId('11.99')).toBeNull();
  });

  it('エリア名のコード以外の部分は自由な文字列でよい', async () => {
    await createDirs(root, ['10-19 🏠 Life [admin] (x)/11 Me & you/11.01 Inbox *']);

    const index = await scanFilesystem(root);

    expect(index.getArea('10-19')?.name).toBe('10-19 🏠 Life [admin] (x)');
    expect(index.getCategory('11')?.name).toBe('11 Me & you');
    expect(index.getId('11.01')?.name).toBe('11.01 Inbox *');
  });
});
