/**
 * ファイルシステムをスキャンしてインデックスを構築
 */

import * as path from 'path';
import { minimatch } from 'minimatch';
import { parseArea, parseCategory, parseId } from './codes.js';
import { listDirectories } from './fs-utils.js';
import { JdArea, JdCategory, JdId, JdIndex } from './models.js';

export interface ScanOptions {
  /** 除外パターン（glob、ルートからの相対パスに対して判定） */
  exclude?: string[];
}

/**
 * JDルートをスキャンしてインデックスを構築
 *
 * 3階層のみを対象とする:
 * - エリア: `XX-YY 名前`（例: "10-19 Life admin"）
 * - カテゴリ: `XX 名前`（例: "11 Finance"）
 * - ID: `XX.YY 名前`（例: "11.01 Inbox"）
 *
 * 同じコードのフォルダが複数ある場合は名前順で最初のものを採用する（パス解決と同じ）。
 * ルートが存在しない場合は空のインデックスを返す。
 */
export async function scanFilesystem(root: string, options: ScanOptions = {}): Promise<JdIndex> {
  const index = new JdIndex();
  const isExcluded = createExcludeFilter(options.exclude ?? []);

  for (const areaDir of await listDirectories(root)) {
    const parsedArea = parseArea(areaDir);
    if (!parsedArea || index.getArea(parsedArea.code) || isExcluded(areaDir)) {
      continue;
    }

    const area = new JdArea(parsedArea.code, parsedArea.name);
    const areaPath = path.join(root, areaDir);

    for (const categoryDir of await listDirectories(areaPath)) {
      const parsedCategory = parseCategory(categoryDir);
      if (
        !parsedCategory ||
        area.getCategory(parsedCategory.code) ||
        isExcluded(`${areaDir}/${categoryDir}`)
      ) {
        continue;
      }

      const category = new JdCategory(parsedCategory.code, parsedCategory.name);
      const categoryPath = path.join(areaPath, categoryDir);

      for (const idDir of await listDirectories(categoryPath)) {
        const parsedId = parseId(idDir);
        if (
          !parsedId ||
          category.getId(parsedId.code) ||
          isExcluded(`${areaDir}/${categoryDir}/${idDir}`)
        ) {
          continue;
        }

        category.addId(new JdId(parsedId.code, parsedId.name, parsedId.section));
      }

      area.addCategory(category);
    }

    index.addArea(area);
  }

  return index;
}

function createExcludeFilter(patterns: string[]): (relativePath: string) => boolean {
  if (patterns.length === 0) {
    return () => false;
  }
  return (relativePath) =>
    patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
}
