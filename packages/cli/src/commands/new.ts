/**
 * new コマンド
 *
 * 新しいIDフォルダの作成先を3段階で決める（フォルダ自体は作成しない）:
 * 1. カテゴリを選ぶ（引数なし、または名前の一部で絞り込み）
 * 2. 空きIDを選ぶ（カテゴリコード指定、番号の一部で絞り込み）
 * 3. IDと名前からフォルダのパスを表示
 */

import * as path from 'path';
import {
  availableSlots,
  detectTier,
  nextFreeId,
  resolvePath,
  type JdCategory,
  type JdIndex,
} from '@jdex/core';
import { createContext, exitWithError, loadIndex, type ContextOptions } from '../utils/context.js';
import { formatItems, messageItem, parseOutputFormat, type ListItem } from '../utils/output.js';

export interface NewRequest {
  /** カテゴリコード、または絞り込み文字列 */
  category?: string;
  /** IDコード、または絞り込み文字列 */
  id?: string;
  /** フォルダ名（コードを除く部分） */
  name?: string;
  /** 0番台で提示する空きIDの数 */
  slotLimit: number;
}

/**
 * 各段階の結果
 * - items: 次の選択肢
 * - path: 作成するフォルダのパス
 */
export type NewStep =
  | { kind: 'items'; items: ListItem[] }
  | { kind: 'path'; path: string };

export interface NewCommandOptions extends ContextOptions {
  format?: string;
}

/**
 * 引数から現在の段階を判定して結果を返す
 */
export async function planNewFolder(
  request: NewRequest,
  index: JdIndex,
  root: string
): Promise<NewStep> {
  const categoryArg = request.category?.trim() ?? '';

  if (detectTier(categoryArg) !== 'category') {
    return { kind: 'items', items: await showCategories(categoryArg, index, root) };
  }

  const category = index.getCategory(categoryArg);
  if (!category) {
    return {
      kind: 'items',
      items: [messageItem(`Category ${categoryArg} not found`, "Run 'jdex build' to rebuild index")],
    };
  }

  const idArg = request.id?.trim() ?? '';
  if (detectTier(idArg) !== 'id') {
    return { kind: 'items', items: showAvailableIds(category, idArg, request.slotLimit) };
  }

  return await showFolderPath(category, idArg, request.name?.trim() ?? '', index, root);
}

/**
 * 1. カテゴリ一覧（フォルダが見つからないカテゴリは除く）
 */
async function showCategories(filter: string, index: JdIndex, root: string): Promise<ListItem[]> {
  const filterLower = filter.toLowerCase();
  const categories: JdCategory[] = [];
  for (const area of index) {
    for (const category of area) {
      if (!filterLower || category.name.toLowerCase().includes(filterLower)) {
        categories.push(category);
      }
    }
  }

  const items: ListItem[] = [];
  for (const category of categories) {
    const categoryPath = await resolvePath(category.code, index, root);
    if (!categoryPath) {
      continue;
    }

    const nextId = nextFreeId(category);
    items.push({
      title: category.name,
      subtitle: nextId ? `Next available: ${nextId}` : 'Category full',
      code: category.code,
      tier: 'category',
      path: categoryPath,
      valid: true,
    });
  }

  if (items.length === 0) {
    return filter
      ? [messageItem(`No categories matching "${filter}"`, 'Try a different search term')]
      : [messageItem('No categories found', "Run 'jdex build' to rebuild index")];
  }

  return items;
}

/**
 * 2. 空きIDの一覧
 */
function showAvailableIds(category: JdCategory, filter: string, slotLimit: number): ListItem[] {
  const available = availableSlots(category, slotLimit);
  if (available.length === 0) {
    return [messageItem(`Category ${category.code} is full`, 'All 100 IDs are in use')];
  }

  const items = available
    .filter((code) => code.includes(filter))
    .map((code): ListItem => ({
      title: code,
      subtitle: hierarchyFor(category, code),
      code,
      tier: 'id',
      path: null,
      valid: true,
    }));

  if (items.length === 0) {
    return [messageItem(`No available IDs matching "${filter}"`, 'Try a different number')];
  }

  return items;
}

/**
 * 3. 作成するフォルダのパス
 */
async function showFolderPath(
  category: JdCategory,
  idCode: string,
  name: string,
  index: JdIndex,
  root: string
): Promise<NewStep> {
  const subtitle = hierarchyFor(category, idCode);

  if (!idCode.startsWith(`${category.code}.`)) {
    return { kind: 'items', items: [messageItem(`ID ${idCode} is not in category ${category.code}`)] };
  }
  if (category.getId(idCode)) {
    return { kind: 'items', items: [messageItem(`ID ${idCode} is already in use`, subtitle)] };
  }
  if (!name) {
    return { kind: 'items', items: [messageItem(`Type a name for ${idCode}`, subtitle)] };
  }

  const categoryPath = await resolvePath(category.code, index, root);
  if (!categoryPath) {
    return {
      kind: 'items',
      items: [messageItem(`Folder for category ${category.code} not found`, "Run 'jdex build' to rebuild index")],
    };
  }

  return { kind: 'path', path: path.join(categoryPath, `${idCode} ${name}`) };
}

/**
 * 配置先の階層表示（エリア → カテゴリ → セクション）
 */
function hierarchyFor(category: JdCategory, idCode: string): string {
  const parts = [category.name];
  if (category.area) {
    parts.unshift(category.area.name);
  }
  const sectionName = category.sectionNameFor(idCode);
  if (sectionName) {
    parts.push(sectionName);
  }
  return parts.join(' → ');
}

/**
 * new コマンドを実行
 */
export async function executeNew(
  category: string | undefined,
  id: string | undefined,
  nameWords: string[],
  options: NewCommandOptions
): Promise<void> {
  try {
    const format = parseOutputFormat(options.format);
    const context = await createContext(options);
    const index = await loadIndex(context);

    const step = await planNewFolder(
      { category, id, name: nameWords.join(' '), slotLimit: context.config.slots.limit },
      index,
      context.config.root
    );

    if (step.kind === 'path') {
      console.log(step.path);
      return;
    }
    console.log(formatItems(step.items, format));
  } catch (error) {
    exitWithError(error);
  }
}
