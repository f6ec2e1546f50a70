/**
 * カテゴリ内の空きID番号の計算
 */

import { formatIdCode } from './codes.js';
import type { JdCategory } from './models.js';

export const MAX_ID_NUMBER = 99;

/** 0番台で提示する空き番号のデフォルト数 */
export const DEFAULT_SLOT_LIMIT = 3;

/**
 * 次に使える空きIDを取得
 * セクション見出しも使用済みとして扱う。満杯なら null
 */
export function nextFreeId(category: JdCategory): string | null {
  const used = category.usedSlots;
  for (let num = 0; num <= MAX_ID_NUMBER; num++) {
    if (!used.has(num)) {
      return formatIdCode(category.code, num);
    }
  }
  return null;
}

/**
 * 新規IDの候補となる空き番号の一覧
 *
 * - 0番台の空き番号を先頭から `limit` 個
 * - セクション見出しのある番台ごとに最初の空き番号を1個
 *
 * 見出しのない10番台以降からは提示しない。結果はコード順。
 */
export function availableSlots(category: JdCategory, limit: number = DEFAULT_SLOT_LIMIT): string[] {
  const used = category.usedSlots;
  const sections = category.sectionDecades;
  const available: string[] = [];
  const coveredDecades = new Set<number>();
  let initialCount = 0;

  for (let num = 0; num <= MAX_ID_NUMBER; num++) {
    if (used.has(num)) {
      continue;
    }

    const decade = Math.floor(num / 10) * 10;

    if (decade === 0) {
      if (initialCount < limit) {
        available.push(formatIdCode(category.code, num));
        initialCount++;
      }
    } else if (sections.has(decade) && !coveredDecades.has(decade)) {
      available.push(formatIdCode(category.code, num));
      coveredDecades.add(decade);
    }
  }

  return available.sort();
}
