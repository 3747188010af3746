import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const rootDir = fileURLToPath(new URL('./', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [{ find: /^@\//, replacement: rootDir }],
  },
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts', 'backend/src/**/__tests__/**/*.test.ts'],
  },
});
