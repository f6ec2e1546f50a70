/**
 * コマンド共通の実行コンテキスト
 */

import { ConfigLoader, IndexStorageError, errorMessage, type JdexConfig } from '@jdex/types';
import type { JdIndex } from '@jdex/core';
import { IndexStorage } from '@jdex/storage';

export interface ContextOptions {
  /** 設定ファイルパス（--config） */
  config?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
  /** 環境変数（テスト用、デフォルト: process.env） */
  env?: NodeJS.ProcessEnv;
}

export interface CommandContext {
  config: JdexConfig;
  configPath: string | null;
  storage: IndexStorage;
}

/**
 * 設定を解決してストレージを準備
 */
export async function createContext(options: ContextOptions = {}): Promise<CommandContext> {
  const { config, configPath } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.cwd,
    env: options.env,
  });

  return {
    config,
    configPath,
    storage: new IndexStorage({ indexPath: config.index.path }),
  };
}

/**
 * 保存済みインデックスを読み込む
 * ファイルがない場合は再構築を促すメッセージに差し替える
 */
export async function loadIndex(context: CommandContext): Promise<JdIndex> {
  try {
    return await context.storage.load();
  } catch (error) {
    if (error instanceof IndexStorageError && error.kind === 'not_found') {
      throw new IndexStorageError(
        error.kind,
        error.path,
        `${error.message}. Run 'jdex build' to create it.`,
        { cause: error }
      );
    }
    throw error;
  }
}

/**
 * エラーを表示して終了
 */
export function exitWithError(error: unknown): never {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
}
