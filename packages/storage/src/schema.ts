/**
 * 永続化インデックスのスキーマ
 */

import { z } from 'zod';
import type { IndexData } from '@jdex/types';

const idSchema = z.object({
  name: z.string(),
  section: z.boolean().optional(),
});

const categorySchema = z.object({
  name: z.string(),
  ids: z.record(z.string(), idSchema).default({}),
});

const areaSchema = z.object({
  name: z.string(),
  categories: z.record(z.string(), categorySchema).default({}),
});

export const indexDataSchema = z.object({
  areas: z.record(z.string(), areaSchema).default({}),
});

/**
 * 読み込んだJSONを検証
 * @throws 構造が不正な場合は問題箇所を含むメッセージのError
 */
export function parseIndexData(raw: unknown): IndexData {
  const result = indexDataSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new Error(`${location}: ${issue.message}`);
  }
  return result.data;
}
