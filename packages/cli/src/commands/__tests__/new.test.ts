/**
 * new コマンドのテスト
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as path from 'path';
import { scanFilesystem, type JdIndex } from '@jdex/core';
import { planNewFolder, type NewStep } from '../new.js';
import type { ListItem } from '../../utils/output.js';
import { SAMPLE_TREE, createDirs, createTempRoot, removeTempRoot } from '../../../../core/src/__tests__/helpers/fixture.js';

function itemsOf(step: NewStep): ListItem[] {
  if (step.kind !== 'items') {
    throw new Error(`expected items, got path ${step.path}`);
  }
  return step.items;
}

describe('planNewFolder', () => {
  let root: string;
  let index: JdIndex;

  beforeAll(async () => {
    root = await createTempRoot('jdex-new-test');
    await createDirs(root, SAMPLE_TREE);
    index = await scanFilesystem(root);
  });

  afterAll(async () => {
    await removeTempRoot(root);
  });

  describe('1. カテゴリの選択', () => {
    it('全カテゴリを次の空きIDとともに表示する', async () => {
      const items = itemsOf(await planNewFolder({ slotLimit: 3 }, index, root));

      expect(items.map((item) => [item.title, item.subtitle])).toEqual([
        ['11 Me', 'Next available: 11.00'],
        ['12 Home', 'Next available: 12.00'],
        ['21 Projects', 'Next available: 21.00'],
      ]);
      expect(items[2].path).toBe(path.join(root, '20-29 Work', '21 Projects'));
    });

    it('カテゴリ名の一部で絞り込める', async () => {
      const items = itemsOf(await planNewFolder({ category: 'PRO', slotLimit: 3 }, index, root));

      expect(items.map((item) => item.code)).toEqual(['21']);
    });

    it('一致するカテゴリがない場合はメッセージを返す', async () => {
      const items = itemsOf(await planNewFolder({ category: 'garden', slotLimit: 3 }, index, root));

      expect(items).toEqual([
        { title: 'No categories matching "garden"', subtitle: 'Try a different search term', path: null, valid: false },
      ]);
    });
  });

  describe('2. 空きIDの選択', () => {
    it('0番台の空きとセクションごとの空きを表示する', async () => {
      const items = itemsOf(await planNewFolder({ category: '11', slotLimit: 3 }, index, root));

      expect(items.map((item) => item.code)).toEqual(['11.00', '11.02', '11.03', '11.12']);
      expect(items[0]).toEqual({
        title: '11.00',
        subtitle: '10-19 Life admin → 11 Me',
        code: '11.00',
        tier: 'id',
        path: null,
        valid: true,
      });
      expect(items[3].subtitle).toBe('10-19 Life admin → 11 Me → 11.10 Health');
    });

    it('番号の一部で絞り込める', async () => {
      const items = itemsOf(await planNewFolder({ category: '11', id: '2', slotLimit: 3 }, index, root));

      expect(items.map((item) => item.code)).toEqual(['11.02', '11.12']);
    });

    it('slotLimitで0番台の候補数が変わる', async () => {
      const items = itemsOf(await planNewFolder({ category: '12', slotLimit: 1 }, index, root));

      expect(items.map((item) => item.code)).toEqual(['12.00']);
    });

    it('存在しないカテゴリはメッセージを返す', async () => {
      const items = itemsOf(await planNewFolder({ category: '99', slotLimit: 3 }, index, root));

      expect(items[0]).toMatchObject({ title: 'Category 99 not found', valid: false });
    });
  });

  describe('3. フォルダのパス', () => {
    it('IDと名前からカテゴリフォルダ内のパスを返す', async () => {
      const step = await planNewFolder(
        { category: '11', id: '11.12', name: 'Dentist visits', slotLimit: 3 },
        index,
        root
      );

      expect(step).toEqual({
        kind: 'path',
        path: path.join(root, '10-19 Life admin', '11 Me', '11.12 Dentist visits'),
      });
    });

    it('名前がない場合は入力を促す', async () => {
      const items = itemsOf(await planNewFolder({ category: '11', id: '11.05', slotLimit: 3 }, index, root));

      expect(items).toEqual([
        { title: 'Type a name for 11.05', subtitle: '10-19 Life admin → 11 Me', path: null, valid: false },
      ]);
    });

    it('使用中のIDは作成先にしない', async () => {
      const items = itemsOf(
        await planNewFolder({ category: '11', id: '11.01', name: 'Other', slotLimit: 3 }, index, root)
      );

      expect(items[0].title).toBe('ID 11.01 is already in use');
    });

    it('別カテゴリのIDは作成先にしない', async () => {
      const items = itemsOf(
        await planNewFolder({ category: '11', id: '21.05', name: 'Other', slotLimit: 3 }, index, root)
      );

      expect(items[0].title).toBe('ID 21.05 is not in category 11');
    });
  });
});
