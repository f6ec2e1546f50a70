/**
 * 永続化されるインデックスの型定義
 *
 * キーはコード、値は名前と子要素
 */

export interface IndexData {
  areas: Record<string, AreaData>;
}

export interface AreaData {
  /** ディレクトリ名（例: "10-19 Life admin"） */
  name: string;
  categories: Record<string, CategoryData>;
}

export interface CategoryData {
  /** ディレクトリ名（例: "11 Finance"） */
  name: string;
  ids: Record<string, IdData>;
}

export interface IdData {
  /** ディレクトリ名（例: "11.01 Inbox"） */
  name: string;
  /** セクション見出しか（書き出し時は true の場合のみ出力） */
  section?: boolean;
}
