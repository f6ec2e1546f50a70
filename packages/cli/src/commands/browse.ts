/**
 * browse コマンド
 *
 * クエリの形式で表示内容を切り替える:
 * - 空 → 全エリア
 * - "10-19" → エリア内のカテゴリ
 * - "11" / "11." → カテゴリ内のID
 * - "11.01" → 該当ID
 * - それ以外 → 名前で全階層を検索
 *
 * --level 指定時は常に検索として扱う。
 */

import {
  breadcrumb,
  resolvePath,
  search,
  type JdArea,
  type JdCategory,
  type JdIndex,
  type JdItem,
} from '@jdex/core';
import { isTier, type Tier } from '@jdex/types';
import { createContext, exitWithError, loadIndex, type ContextOptions } from '../utils/context.js';
import { formatItems, messageItem, parseOutputFormat, type ListItem } from '../utils/output.js';

const AREA_QUERY = /^(\d0-\d9)$/;
const CATEGORY_QUERY = /^(\d{2})\.?$/;
const ID_QUERY = /^(\d{2}\.\d{2})$/;

const LEVEL_LABELS: Record<Tier, string> = {
  area: 'areas',
  category: 'categories',
  id: 'IDs',
};

export interface BrowseOptions {
  /** 検索対象の階層 */
  level?: Tier;
  /** 検索結果の上限 */
  limit: number;
}

export interface BrowseCommandOptions extends ContextOptions {
  level?: string;
  limit?: string;
  format?: string;
}

/**
 * クエリに応じた一覧を作成
 */
export async function browse(
  query: string,
  index: JdIndex,
  root: string,
  options: BrowseOptions
): Promise<ListItem[]> {
  const trimmed = query.trim();

  if (options.level) {
    if (!trimmed) {
      return [messageItem(`Search ${LEVEL_LABELS[options.level]}...`, 'Start typing to search')];
    }
    return await searchItems(trimmed, index, root, options);
  }

  if (!trimmed) {
    return await showAreas(index, root);
  }

  const areaMatch = AREA_QUERY.exec(trimmed);
  if (areaMatch) {
    return await showCategoriesInArea(areaMatch[1], index, root);
  }

  const categoryMatch = CATEGORY_QUERY.exec(trimmed);
  if (categoryMatch) {
    return await showIdsInCategory(categoryMatch[1], index, root);
  }

  const idMatch = ID_QUERY.exec(trimmed);
  if (idMatch) {
    return await showId(idMatch[1], index, root);
  }

  return await searchItems(trimmed, index, root, options);
}

/**
 * インデックスの要素を一覧の項目に変換
 * セクション見出しはフォルダを持たないため選択不可
 */
async function toListItem(
  item: JdItem,
  subtitle: string,
  index: JdIndex,
  root: string
): Promise<ListItem> {
  const isSection = item.tier === 'id' && item.section;
  return {
    title: item.name,
    subtitle,
    code: item.code,
    tier: item.tier,
    path: isSection ? null : await resolvePath(item.code, index, root),
    valid: !isSection,
  };
}

async function showAreas(index: JdIndex, root: string): Promise<ListItem[]> {
  const areas: JdArea[] = [...index];
  if (areas.length === 0) {
    return [messageItem('No areas found', "Run 'jdex build' to rebuild index")];
  }

  return await Promise.all(
    areas.map((area) => toListItem(area, `${area.size} categories`, index, root))
  );
}

async function showCategoriesInArea(code: string, index: JdIndex, root: string): Promise<ListItem[]> {
  const area = index.getArea(code);
  if (!area) {
    return [messageItem(`Area ${code} not found`)];
  }

  const categories: JdCategory[] = [...area];
  return await Promise.all(
    categories.map((category) => toListItem(category, `${category.size} items`, index, root))
  );
}

async function showIdsInCategory(code: string, index: JdIndex, root: string): Promise<ListItem[]> {
  const category = index.getCategory(code);
  if (!category) {
    return [messageItem(`Category ${code} not found`)];
  }

  return await Promise.all([...category].map((id) => toListItem(id, breadcrumb(id), index, root)));
}

async function showId(code: string, index: JdIndex, root: string): Promise<ListItem[]> {
  const id = index.getId(code);
  if (!id) {
    return [messageItem(`ID ${code} not found`)];
  }

  return [await toListItem(id, breadcrumb(id), index, root)];
}

async function searchItems(
  query: string,
  index: JdIndex,
  root: string,
  options: BrowseOptions
): Promise<ListItem[]> {
  const matches = search(query, index, { level: options.level }).slice(0, options.limit);

  if (matches.length === 0) {
    const levelHint = options.level ? ` in ${LEVEL_LABELS[options.level]}` : '';
    return [messageItem(`No results for "${query}"${levelHint}`, 'Try a different search term')];
  }

  return await Promise.all(
    matches.map((match) => toListItem(match.item, match.subtitle, index, root))
  );
}

/**
 * --level / --limit オプションを検証
 */
export function parseBrowseOptions(
  options: Pick<BrowseCommandOptions, 'level' | 'limit'>,
  defaultLimit: number
): BrowseOptions {
  const { level, limit } = options;

  let parsedLevel: Tier | undefined;
  if (level !== undefined) {
    if (!isTier(level)) {
      throw new Error(`Unknown level: ${level} (expected area, category or id)`);
    }
    parsedLevel = level;
  }

  let parsedLimit = defaultLimit;
  if (limit !== undefined) {
    parsedLimit = /^\d+$/.test(limit) ? parseInt(limit, 10) : NaN;
    if (!Number.isInteger(parsedLimit) || parsedLimit < 1) {
      throw new Error(`--limit must be a positive integer: ${limit}`);
    }
  }

  return { level: parsedLevel, limit: parsedLimit };
}

/**
 * browse コマンドを実行
 */
export async function executeBrowse(query: string | undefined, options: BrowseCommandOptions): Promise<void> {
  try {
    const format = parseOutputFormat(options.format);
    const context = await createContext(options);
    const browseOptions = parseBrowseOptions(options, context.config.search.defaultLimit);
    const index = await loadIndex(context);

    const items = await browse(query ?? '', index, context.config.root, browseOptions);
    console.log(formatItems(items, format));
  } catch (error) {
    exitWithError(error);
  }
}
