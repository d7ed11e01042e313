import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@fleet/protocol': path.resolve(rootDir, 'packages/protocol/src/index.ts'),
      '@fleet/heartbeat': path.resolve(rootDir, 'packages/heartbeat/src/index.ts')
    }
  },
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    isolate: true,
    setupFiles: ['./vitest.global.setup.ts'],
    testTimeout: 15_000,
    hookTimeout: 30_000,
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: [
            'packages/**/__tests__/**/*.test.ts',
            'services/**/src/tests/unit/**/*.test.ts'
          ],
          exclude: ['**/node_modules/**', '**/dist/**']
        }
      },
      {
        extends: true,
        test: {
          name: 'lifecycle',
          include: ['tests/**/*.test.ts'],
          exclude: ['**/node_modules/**', '**/dist/**']
        }
      }
    ]
  }
});
