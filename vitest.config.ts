import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'workers/*/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent'
    }
  },
  resolve: {
    alias: {
      '@audio-batch/core': path.resolve(__dirname, 'packages/audio-core/src')
    }
  }
});
