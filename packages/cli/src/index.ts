#!/usr/bin/env node
/**
 * jdex CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { TIERS } from '@jdex/types';
import { executeBuild } from './commands/build.js';
import { executeBrowse, type BrowseCommandOptions } from './commands/browse.js';
import { executeResolve } from './commands/resolve.js';
import { executeNew, type NewCommandOptions } from './commands/new.js';
import { executeIndexStatus, type IndexStatusOptions } from './commands/index/status.js';
import { initConfig } from './commands/config/init.js';
import { exitWithError } from './utils/context.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('jdex')
  .description('Johnny Decimal フォルダの閲覧・検索ツール')
  .version(packageJson.version)
  .addOption(
    new Option('-c, --config <path>', '設定ファイルのパス')
      .env('JDEX_CONFIG')
  )
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

// build コマンド
program
  .command('build')
  .description('JDルートをスキャンしてインデックスを再構築')
  .action(async () => {
    await executeBuild({ config: globalConfigPath });
  });

// browse コマンド
program
  .command('browse')
  .description('エリア・カテゴリ・IDを閲覧、または名前で検索')
  .argument('[query]', 'コード（10-19, 11, 11.01）または検索クエリ')
  .addOption(
    new Option('-l, --level <tier>', '検索対象の階層（検索のみ）').choices(TIERS)
  )
  .option('--limit <n>', '最大結果数')
  .option('--format <format>', '出力形式 (text, json)', 'text')
  .action(async (query: string | undefined, options: BrowseCommandOptions) => {
    await executeBrowse(query, { ...options, config: globalConfigPath });
  });

// resolve コマンド
program
  .command('resolve')
  .description('コードに対応するフォルダのパスを表示')
  .argument('<code>', 'コード（10-19, 11, 11.01）')
  .action(async (code: string) => {
    await executeResolve(code, { config: globalConfigPath });
  });

// new コマンド
program
  .command('new')
  .description('新しいIDフォルダの作成先を決める')
  .argument('[category]', 'カテゴリコード、または絞り込み文字列')
  .argument('[id]', 'IDコード、または絞り込み文字列')
  .argument('[name...]', 'フォルダ名')
  .option('--format <format>', '出力形式 (text, json)', 'text')
  .action(
    async (
      category: string | undefined,
      id: string | undefined,
      name: string[],
      options: NewCommandOptions
    ) => {
      await executeNew(category, id, name, { ...options, config: globalConfigPath });
    }
  );

// index コマンド
const indexCmd = program
  .command('index')
  .description('インデックス管理');

indexCmd
  .command('status')
  .description('インデックスのステータスを確認')
  .option('--format <format>', '出力形式 (text, json)', 'text')
  .action(async (options: IndexStatusOptions) => {
    await executeIndexStatus({ ...options, config: globalConfigPath });
  });

// config コマンド
const configCmd = program
  .command('config')
  .description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('--root <path>', 'JDルート')
  .option('-f, --force', '既存ファイルを上書き')
  .action(async (options: { root?: string; force?: boolean }) => {
    try {
      await initConfig(options);
    } catch (error) {
      exitWithError(error);
    }
  });

// コマンドラインを解析
await program.parseAsync(process.argv);
