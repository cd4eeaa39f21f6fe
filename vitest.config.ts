import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { config } from 'dotenv';

const root = fileURLToPath(new URL('.', import.meta.url));

config({ path: resolve(root, '.env') });

export default defineConfig({
  resolve: {
    alias: {
      '@': resolve(root, 'src'),
    },
  },
  test: {
    globals: true,
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**'],
      exclude: ['src/**/*.d.ts', 'src/cli/index.ts'],
      thresholds: {
        lines: 80,
        branches: 70,
      },
    },
  },
});
