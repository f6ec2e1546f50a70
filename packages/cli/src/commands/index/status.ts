/**
 * index status コマンド
 */

import type { IndexCounts } from '@jdex/core';
import { createContext, exitWithError, loadIndex, type CommandContext, type ContextOptions } from '../../utils/context.js';
import { parseOutputFormat } from '../../utils/output.js';

/**
 * index status コマンドのオプション
 */
export interface IndexStatusOptions extends ContextOptions {
  format?: string;
}

export interface IndexStatus {
  root: string;
  indexPath: string;
  counts: IndexCounts;
}

/**
 * 保存済みインデックスの件数を取得
 */
export async function getIndexStatus(context: CommandContext): Promise<IndexStatus> {
  const index = await loadIndex(context);
  return {
    root: context.config.root,
    indexPath: context.storage.indexPath,
    counts: index.count(),
  };
}

/**
 * ステータスをテキスト形式で出力
 */
export function formatIndexStatus(status: IndexStatus): string {
  return [
    'Index Status',
    '━'.repeat(40),
    `  Root:       ${status.root}`,
    `  Index:      ${status.indexPath}`,
    `  Areas:      ${status.counts.areas}`,
    `  Categories: ${status.counts.categories}`,
    `  IDs:        ${status.counts.ids}`,
  ].join('\n');
}

/**
 * index status コマンドを実行
 */
export async function executeIndexStatus(options: IndexStatusOptions): Promise<void> {
  try {
    const format = parseOutputFormat(options.format);
    const context = await createContext(options);
    const status = await getIndexStatus(context);

    if (format === 'json') {
      console.log(JSON.stringify(status, null, 2));
      return;
    }

    console.log(formatIndexStatus(status));
  } catch (error) {
    exitWithError(error);
  }
}
