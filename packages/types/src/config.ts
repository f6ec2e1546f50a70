/**
 * 設定ファイルの型定義
 */

export interface JdexConfig {
  version: string;
  /** Johnny Decimalのルートディレクトリ（`~`は展開される） */
  root: string;
  index: IndexConfig;
  scan: ScanConfig;
  search: SearchConfig;
  slots: SlotsConfig;
}

export interface IndexConfig {
  /** インデックスJSONファイルのパス */
  path: string;
}

export interface ScanConfig {
  /** スキャンから除外するディレクトリパターン（glob、ルートからの相対パス） */
  exclude: string[];
}

export interface SearchConfig {
  /** 表示する検索結果の上限 */
  defaultLimit: number;
}

export interface SlotsConfig {
  /** 0番台で提示する空きIDの数 */
  limit: number;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: JdexConfig = {
  version: '1.0',
  root: '~/Documents',
  index: {
    path: '~/.config/jd/index.json',
  },
  scan: {
    exclude: [],
  },
  search: {
    defaultLimit: 50,
  },
  slots: {
    limit: 3,
  },
};
