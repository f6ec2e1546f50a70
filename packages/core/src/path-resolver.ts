/**
 * コードから実際のフォルダパスを解決
 *
 * フォルダ名は変更されうるため、パスはキャッシュせず毎回ディスクを参照する。
 */

import * as path from 'path';
import { startsWithCode } from './codes.js';
import { listDirectories } from './fs-utils.js';
import type { JdIndex } from './models.js';

/**
 * コードに対応するフォルダのパスを取得
 *
 * エリア（10-19）、カテゴリ（11）、ID（11.01）のいずれにも対応する。
 * インデックスにないコード、途中の階層が見つからない場合、
 * セクション見出しの場合は null を返す。
 */
export async function resolvePath(
  code: string,
  index: JdIndex,
  root: string
): Promise<string | null> {
  const item = index.find(code);
  if (!item) {
    return null;
  }

  switch (item.tier) {
    case 'area':
      return await findFolderByCode(root, item.code);

    case 'category': {
      const area = item.area;
      if (!area) {
        return null;
      }
      const areaPath = await findFolderByCode(root, area.code);
      return areaPath ? await findFolderByCode(areaPath, item.code) : null;
    }

    case 'id': {
      if (item.section) {
        return null;
      }
      const category = index.getCategory(item.categoryCode);
      const area = category?.area;
      if (!category || !area) {
        return null;
      }
      const areaPath = await findFolderByCode(root, area.code);
      if (!areaPath) {
        return null;
      }
      const categoryPath = await findFolderByCode(areaPath, category.code);
      return categoryPath ? await findFolderByCode(categoryPath, item.code) : null;
    }
  }
}

/**
 * 親ディレクトリ直下で「コード + 空白」で始まるフォルダを探す
 * 複数ある場合は名前順で最初のもの
 */
export async function findFolderByCode(parent: string, code: string): Promise<string | null> {
  for (const name of await listDirectories(parent)) {
    if (startsWithCode(name, code)) {
      return path.join(parent, name);
    }
  }
  return null;
}
