/**
 * インデックスのテキスト検索
 */

import type { Tier } from '@jdex/types';
import { breadcrumb, compareCodes, type JdIndex, type JdItem } from './models.js';

export interface SearchOptions {
  /** 対象の階層（省略時は全階層） */
  level?: Tier;
  /** セクション見出しを結果に含めるか（デフォルト: false） */
  includeSections?: boolean;
}

export interface SearchMatch {
  code: string;
  name: string;
  tier: Tier;
  score: number;
  /** 表示用のパンくず */
  subtitle: string;
  item: JdItem;
}

/**
 * 名前で全要素を検索
 *
 * クエリは空白で単語に分割し、すべての単語を含む名前にマッチする（大文字小文字は区別しない）。
 * 結果はスコアの降順、同点はコードの昇順。
 */
export function search(query: string, index: JdIndex, options: SearchOptions = {}): SearchMatch[] {
  const { level, includeSections = false } = options;
  const words = splitQuery(query);
  const phrase = words.join(' ');
  const matches: SearchMatch[] = [];

  const consider = (item: JdItem): void => {
    if (!matchesAllWords(item.name, words)) {
      return;
    }
    matches.push({
      code: item.code,
      name: item.name,
      tier: item.tier,
      score: scoreMatch(item.name, phrase),
      subtitle: breadcrumb(item),
      item,
    });
  };

  for (const area of index) {
    if (!level || level === 'area') {
      consider(area);
    }

    for (const category of area) {
      if (!level || level === 'category') {
        consider(category);
      }

      if (!level || level === 'id') {
        for (const id of category) {
          if (id.section && !includeSections) {
            continue;
          }
          consider(id);
        }
      }
    }
  }

  return matches.sort((a, b) => b.score - a.score || compareCodes(a.code, b.code));
}

export function splitQuery(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter((word) => word.length > 0);
}

/**
 * すべての単語が名前に含まれるか
 */
export function matchesAllWords(name: string, words: string[]): boolean {
  const nameLower = name.toLowerCase();
  return words.every((word) => nameLower.includes(word));
}

/**
 * マッチのスコア
 * クエリ全体が連続して含まれる場合は 100 - 名前の長さ、そうでなければ -名前の長さ
 * 長さはコードポイント数（絵文字は1文字）
 */
export function scoreMatch(name: string, phrase: string): number {
  const length = [...name].length;
  if (name.toLowerCase().includes(phrase)) {
    return 100 - length;
  }
  return -length;
}
