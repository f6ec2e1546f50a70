/**
 * Johnny Decimalコードのパース
 *
 * ディレクトリ名は「コード + 空白 + 任意の名前」の形式
 * - エリア: "10-19 Life admin"
 * - カテゴリ: "11 Finance"
 * - ID: "11.01 Inbox"
 */

import type { Tier } from '@jdex/types';

export const AREA_PATTERN = /^(\d0-\d9)\s+(.*)$/;
export const CATEGORY_PATTERN = /^(\d{2})\s+(.*)$/;
export const ID_PATTERN = /^(\d{2}\.\d{2})\s+(.*)$/;

/** セクション見出しを示すマーカー */
export const SECTION_MARKER = '■';

export interface ParsedName {
  code: string;
  /** ディレクトリ名全体（コードを含む） */
  name: string;
}

export interface ParsedIdName extends ParsedName {
  section: boolean;
}

export function parseArea(dirName: string): ParsedName | null {
  const match = AREA_PATTERN.exec(dirName);
  return match ? { code: match[1], name: dirName } : null;
}

export function parseCategory(dirName: string): ParsedName | null {
  const match = CATEGORY_PATTERN.exec(dirName);
  return match ? { code: match[1], name: dirName } : null;
}

export function parseId(dirName: string): ParsedIdName | null {
  const match = ID_PATTERN.exec(dirName);
  if (!match) {
    return null;
  }
  return { code: match[1], name: dirName, section: isSectionName(dirName) };
}

/**
 * セクション見出しかどうか
 * マーカーの位置は問わない（先頭固定にするかは未決定）
 */
export function isSectionName(name: string): boolean {
  return name.includes(SECTION_MARKER);
}

/**
 * 単体のコードから階層を判定
 * @returns "10-19" → area, "11" → category, "11.01" → id, それ以外は null
 */
export function detectTier(code: string): Tier | null {
  if (/^\d0-\d9$/.test(code)) {
    return 'area';
  }
  if (/^\d{2}$/.test(code)) {
    return 'category';
  }
  if (/^\d{2}\.\d{2}$/.test(code)) {
    return 'id';
  }
  return null;
}

/**
 * カテゴリコードと番号からIDコードを生成（例: "11", 5 → "11.05"）
 */
export function formatIdCode(categoryCode: string, num: number): string {
  return `${categoryCode}.${String(num).padStart(2, '0')}`;
}

/**
 * ディレクトリ名がコード + 空白で始まるか
 */
export function startsWithCode(dirName: string, code: string): boolean {
  const escaped = code.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&');
  return new RegExp(`^${escaped}\\s`).test(dirName);
}
