import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/integration/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@model-bootstrap/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@model-bootstrap/hub-client': resolveFromRoot('packages/hub-client/src/index.ts'),
      '@model-bootstrap/fetcher': resolveFromRoot('packages/fetcher/src/index.ts'),
      '@model-bootstrap/cli': resolveFromRoot('packages/cli/src/index.ts'),
    },
  },
});
