/**
 * resolve コマンド
 * コードに対応するフォルダのパスを表示する
 */

import { resolvePath } from '@jdex/core';
import { createContext, exitWithError, loadIndex, type ContextOptions } from '../utils/context.js';

export type ResolveOptions = ContextOptions;

/**
 * resolve コマンドを実行
 */
export async function executeResolve(code: string, options: ResolveOptions): Promise<void> {
  try {
    const context = await createContext(options);
    const index = await loadIndex(context);
    const target = code.trim();

    const folderPath = await resolvePath(target, index, context.config.root);
    if (!folderPath) {
      throw new Error(`No folder found for ${target}`);
    }

    console.log(folderPath);
  } catch (error) {
    exitWithError(error);
  }
}
