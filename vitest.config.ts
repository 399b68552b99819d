import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@notekeeper/core': fileURLToPath(new URL('./packages/notes-core/src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/notes-core/src/**/*.test.ts', 'packages/notes-cli/src/**/*.test.ts'],
  },
});
