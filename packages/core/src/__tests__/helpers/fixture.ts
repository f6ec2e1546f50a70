/**
 * テスト用のJDフォルダツリー
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

/** コマンドテストで使う標準のツリー（ルートからの相対パス） */
export const SAMPLE_TREE = [
  '10-19 Life admin/11 Me/11.01 Inbox',
  '10-19 Life admin/11 Me/11.10 ■ Health',
  '10-19 Life admin/11 Me/11.11 Checkups',
  '10-19 Life admin/12 Home',
  '20-29 Work/21 Projects/21.01 Roadmap',
];

/**
 * 一意な一時ディレクトリを作成
 */
export async function createTempRoot(prefix: string): Promise<string> {
  const dir = join(tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

/**
 * ルート配下にディレクトリを作成
 * @param dirs ルートからの相対パス（例: "10-19 Life/11 Me/11.01 Inbox"）
 */
export async function createDirs(root: string, dirs: string[]): Promise<void> {
  for (const dir of dirs) {
    await fs.mkdir(join(root, dir), { recursive: true });
  }
}

export async function removeTempRoot(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
