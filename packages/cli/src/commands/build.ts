/**
 * build コマンド
 * JDルートをスキャンしてインデックスを再構築する
 */

import { scanFilesystem, type IndexCounts } from '@jdex/core';
import { createContext, exitWithError, type CommandContext, type ContextOptions } from '../utils/context.js';

export type BuildOptions = ContextOptions;

export interface BuildResult {
  root: string;
  indexPath: string;
  counts: IndexCounts;
}

/**
 * インデックスを再構築して保存
 * JDフォルダが1つもない場合は保存せずにエラーとする
 */
export async function rebuildIndex(context: CommandContext): Promise<BuildResult> {
  const { root, scan } = context.config;
  const index = await scanFilesystem(root, { exclude: scan.exclude });

  if (index.size === 0) {
    throw new Error(`No JD folders found in ${root}`);
  }

  await context.storage.save(index);

  return {
    root,
    indexPath: context.storage.indexPath,
    counts: index.count(),
  };
}

/**
 * build コマンドを実行
 */
export async function executeBuild(options: BuildOptions): Promise<void> {
  try {
    const context = await createContext(options);
    const { counts } = await rebuildIndex(context);

    console.log(
      `Index rebuilt: ${counts.areas} areas, ${counts.categories} categories, ${counts.ids} IDs`
    );
  } catch (error) {
    exitWithError(error);
  }
}
