/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CONFIG_FILE_NAMES, ConfigLoader, isNotFoundError, type JdexConfig } from '@jdex/types';

export interface ConfigInitOptions {
  /** JDルート（デフォルト: ~/Documents） */
  root?: string;
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * 設定オブジェクトを生成
 * パスは `~` を含んだまま書き出す
 */
function createInitialConfig(options: ConfigInitOptions): JdexConfig {
  const config = ConfigLoader.getDefaultConfig();
  if (options.root) {
    config.root = options.root;
  }
  return config;
}

/**
 * config init コマンドを実行
 * @returns 作成した設定ファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, CONFIG_FILE_NAMES[0]);

  console.log('Initializing jdex configuration...\n');

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
      );
    }

    console.log('⚠️  Overwriting existing configuration file...\n');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if (!isNotFoundError(error)) {
      throw error;
    }
  }

  const config = createInitialConfig(options);

  // ファイル書き込み
  const configContent = JSON.stringify(config, null, 2) + '\n';
  await fs.writeFile(configPath, configContent, 'utf-8');

  console.log('✅ Configuration file created successfully!\n');
  console.log(`📄 File: ${configPath}`);
  console.log(`📁 Root: ${config.root}`);
  console.log(`🗂  Index: ${config.index.path}\n`);
  console.log('Next steps:');
  console.log(`  1. Review and customize ${CONFIG_FILE_NAMES[0]}`);
  console.log('  2. Build the index: jdex build');
  console.log('  3. Browse folders: jdex browse "query"\n');

  return configPath;
}
