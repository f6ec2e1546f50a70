import fg from 'fast-glob';

/**
 * 直下のサブディレクトリ名をコード順で取得
 *
 * 存在しない・読めないディレクトリは空として扱う
 */
export async function listDirectories(dir: string): Promise<string[]> {
  const names = await fg('*', {
    cwd: dir,
    onlyDirectories: true,
    dot: true,
    followSymbolicLinks: true,
    suppressErrors: true,
  });
  return names.sort();
}
