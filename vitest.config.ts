import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function resolveSource(relativePath: string): string {
  return fileURLToPath(new URL(relativePath, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@hocr-verses/core': resolveSource('./packages/core/src/index.ts'),
      '@hocr-verses/parser-hocr': resolveSource('./packages/parser/hocr/src/index.ts'),
      '@hocr-verses/generator-csv': resolveSource('./packages/generator/csv/src/index.ts'),
      '@hocr-verses/watcher-chokidar': resolveSource('./packages/watcher/chokidar/src/index.ts'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/**/tests/**/*.test.ts'],
  },
});
