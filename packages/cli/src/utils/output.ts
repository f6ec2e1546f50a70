/**
 * 出力フォーマットユーティリティ
 */

import type { Tier } from '@jdex/types';

export type OutputFormat = 'text' | 'json';

/**
 * 一覧表示の1項目
 */
export interface ListItem {
  title: string;
  subtitle: string;
  code?: string;
  tier?: Tier;
  /** 解決済みのフォルダパス（見つからない場合は null） */
  path: string | null;
  /** 選択可能な項目か（メッセージ行は false） */
  valid: boolean;
}

/**
 * 選択できないメッセージ行を作成
 */
export function messageItem(title: string, subtitle: string = ''): ListItem {
  return { title, subtitle, path: null, valid: false };
}

/**
 * 一覧をJSON形式で出力
 */
export function formatItemsAsJson(items: ListItem[]): string {
  return JSON.stringify({ items }, null, 2);
}

/**
 * 一覧をテキスト形式で出力
 *
 * 1行目にタイトル、続けてサブタイトルとパスを字下げして表示する
 */
export function formatItemsAsText(items: ListItem[]): string {
  const lines: string[] = [];

  for (const item of items) {
    lines.push(item.title);
    if (item.subtitle) {
      lines.push(`  ${item.subtitle}`);
    }
    if (item.path) {
      lines.push(`  ${item.path}`);
    }
  }

  return lines.join('\n');
}

export function formatItems(items: ListItem[], format: OutputFormat = 'text'): string {
  return format === 'json' ? formatItemsAsJson(items) : formatItemsAsText(items);
}

/**
 * --format オプションの値を検証
 */
export function parseOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'text' || value === 'json') {
    return value ?? 'text';
  }
  throw new Error(`Unknown format: ${value} (expected text or json)`);
}
