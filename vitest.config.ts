import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolve = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      NODE_ENV: 'test'
    },
    include: ['packages/*/test/**/*.test.ts', 'audio/test/**/*.test.ts', 'gateway/test/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks'
  },
  resolve: {
    alias: {
      '@dialtone/logger': resolve('./packages/logger/src/index.ts'),
      '@dialtone/config': resolve('./packages/config/src/index.ts'),
      '@dialtone/audio': resolve('./audio/src/index.ts')
    }
  }
});
