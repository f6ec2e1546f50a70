import { readFile, access } from 'fs/promises';
import { constants } from 'fs';
import { homedir } from 'os';
import * as path from 'path';
import type { JdexConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig } from './validator.js';
import { isNotFoundError } from '../errors.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 環境変数（デフォルト: process.env、テスト用に差し替え可能） */
  env?: NodeJS.ProcessEnv;
}

/**
 * 解決済みの設定
 * root と index.path は絶対パスに展開済み
 */
export interface ResolvedConfig {
  config: JdexConfig;
  configPath: string | null;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .jdex.json > jdex.json
 */
export const CONFIG_FILE_NAMES = ['.jdex.json', 'jdex.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（パスは未展開）
   */
  static async load(configPath: string): Promise<JdexConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      // バリデーション
      const config = validateConfig(parsed);

      // デフォルト値とマージ
      return this.mergeWithDefaults(config);
    } catch (error) {
      if (isNotFoundError(error)) {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの探索（明示パス > JDEX_CONFIG > 自動探索）
   * - 環境変数 JD_ROOT / JD_INDEX による上書き
   * - `~` の展開と相対パスの解決
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const {
      configPath: explicitPath,
      traverseUp = true,
      cwd = process.cwd(),
      env = process.env,
    } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp, env);
    const loaded = configPath ? await this.load(configPath) : this.getDefaultConfig();

    // 設定ファイル内の相対パスは設定ファイルのディレクトリ基準
    const baseDir = configPath ? path.dirname(configPath) : cwd;

    const root = env.JD_ROOT
      ? this.expandPath(env.JD_ROOT, cwd)
      : this.expandPath(loaded.root, baseDir);
    const indexPath = env.JD_INDEX
      ? this.expandPath(env.JD_INDEX, cwd)
      : this.expandPath(loaded.index.path, baseDir);

    return {
      config: {
        ...loaded,
        root,
        index: { ...loaded.index, path: indexPath },
      },
      configPath,
    };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): JdexConfig {
    return {
      ...DEFAULT_CONFIG,
      index: { ...DEFAULT_CONFIG.index },
      scan: { exclude: [...DEFAULT_CONFIG.scan.exclude] },
      search: { ...DEFAULT_CONFIG.search },
      slots: { ...DEFAULT_CONFIG.slots },
    };
  }

  /**
   * `~` をホームディレクトリに展開し、絶対パスに変換
   */
  static expandPath(target: string, baseDir: string): string {
    if (target === '~') {
      return homedir();
    }
    if (target.startsWith('~/')) {
      return path.join(homedir(), target.slice(2));
    }
    return path.resolve(baseDir, target);
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(
    startDir: string,
    traverseUp: boolean
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      // 親ディレクトリへ
      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean,
    env: NodeJS.ProcessEnv
  ): Promise<string | null> {
    // 1. 明示的に指定されている
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    // 2. 環境変数
    const envPath = env.JDEX_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    // 3. 自動探索
    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: Partial<JdexConfig>): JdexConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      root: config.root ?? DEFAULT_CONFIG.root,
      index: {
        path: config.index?.path ?? DEFAULT_CONFIG.index.path,
      },
      scan: {
        exclude: config.scan?.exclude ?? [...DEFAULT_CONFIG.scan.exclude],
      },
      search: {
        defaultLimit: config.search?.defaultLimit ?? DEFAULT_CONFIG.search.defaultLimit,
      },
      slots: {
        limit: config.slots?.limit ?? DEFAULT_CONFIG.slots.limit,
      },
    };
  }
}
