import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

export default defineConfig({
  resolve: {
    alias: {
      '@': path.dirname(fileURLToPath(import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['cli/**/*.test.ts', 'lib/**/*.test.ts', 'types/**/*.test.ts'],
  },
});
