import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@readlock/protocol': fileURLToPath(new URL('./packages/protocol/src/index.ts', import.meta.url)),
      '@': fileURLToPath(new URL('./apps/reader/src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    globals: false,
    env: {
      READLOCK_HOME_DIR: join(tmpdir(), 'readlock-vitest-home'),
    },
  },
});
