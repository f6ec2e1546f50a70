import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

/**
 * ワークスペースパッケージはビルドせずにソースを直接読み込む
 */
function sourceOf(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@jdex/types': sourceOf('types'),
      '@jdex/core': sourceOf('core'),
      '@jdex/storage': sourceOf('storage'),
    },
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**', // ビルド成果物を除外（重複実行を防止）
    ],
    environment: 'node',
    // 一時ディレクトリを使うテストが多いため直列実行
    fileParallelism: false,
    reporters: ['default'],
  },
});
