/**
 * インデックスのJSONファイル保存
 */

import { promises as fs } from 'node:fs';
import { dirname, normalize } from 'node:path';
import { JdIndex } from '@jdex/core';
import { IndexStorageError, errorMessage, isNotFoundError } from '@jdex/types';
import { parseIndexData } from './schema.js';

export interface IndexStorageOptions {
  /** インデックスファイルのパス */
  indexPath: string;
}

/**
 * ファイルベースのインデックスストレージ
 * UTF-8のJSON（インデント2、末尾改行）で保存する
 */
export class IndexStorage {
  readonly indexPath: string;

  constructor(options: IndexStorageOptions) {
    this.indexPath = normalize(options.indexPath);
  }

  /**
   * インデックスを保存
   *
   * 一時ファイルに書き出してから置き換えるため、途中で失敗しても既存のファイルは残る
   * @throws IndexStorageError（kind: unwritable）
   */
  async save(index: JdIndex): Promise<void> {
    const content = JSON.stringify(index.toData(), null, 2) + '\n';

    try {
      // ディレクトリを作成
      await fs.mkdir(dirname(this.indexPath), { recursive: true });
    } catch (error) {
      throw this.writeError(error);
    }

    const tmpPath = this.tmpPath;
    try {
      await fs.writeFile(tmpPath, content, 'utf-8');
      await fs.rename(tmpPath, this.indexPath);
    } catch (error) {
      await fs.rm(tmpPath, { recursive: true, force: true });
      throw this.writeError(error);
    }
  }

  /**
   * 保存時の一時ファイルのパス
   */
  get tmpPath(): string {
    return `${this.indexPath}.tmp-${process.pid}`;
  }

  /**
   * インデックスを読み込む
   *
   * 失敗の種類ごとに異なる kind の IndexStorageError を投げる:
   * not_found / empty / malformed / unreadable
   */
  async load(): Promise<JdIndex> {
    const content = await this.readContent();

    if (content.trim() === '') {
      throw new IndexStorageError(
        'empty',
        this.indexPath,
        "Index file is empty. Run 'jdex build' to rebuild."
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new IndexStorageError(
        'malformed',
        this.indexPath,
        `Invalid JSON in index file: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    try {
      return JdIndex.fromData(parseIndexData(raw));
    } catch (error) {
      throw new IndexStorageError(
        'malformed',
        this.indexPath,
        `Invalid index structure: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * インデックスファイルの存在確認
   */
  async exists(): Promise<boolean> {
    try {
      await fs.access(this.indexPath);
      return true;
    } catch {
      return false;
    }
  }

  private writeError(error: unknown): IndexStorageError {
    return new IndexStorageError(
      'unwritable',
      this.indexPath,
      `Cannot write index file: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  private async readContent(): Promise<string> {
    try {
      return await fs.readFile(this.indexPath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new IndexStorageError(
          'not_found',
          this.indexPath,
          `Index file not found: ${this.indexPath}`,
          { cause: error }
        );
      }
      throw new IndexStorageError(
        'unreadable',
        this.indexPath,
        `Cannot read index file: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
