/**
 * 永続化インデックスの読み書きエラー
 */

/**
 * エラー種別
 * - not_found: ファイルが存在しない
 * - empty: ファイルが空
 * - malformed: JSONまたは構造が不正
 * - unreadable: 読み込み時のI/Oエラー（権限など）
 * - unwritable: 書き込み時のI/Oエラー
 */
export type IndexStorageErrorKind =
  | 'not_found'
  | 'empty'
  | 'malformed'
  | 'unreadable'
  | 'unwritable';

export class IndexStorageError extends Error {
  readonly kind: IndexStorageErrorKind;
  /** 対象のインデックスファイル */
  readonly path: string;

  constructor(
    kind: IndexStorageErrorKind,
    path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IndexStorageError';
    this.kind = kind;
    this.path = path;
  }
}

/**
 * 任意の例外からメッセージを取り出す
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * ファイルが存在しないことを示すNode.jsのエラーか
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
