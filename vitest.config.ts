import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: false,
    dir: path.resolve(process.cwd()),
    setupFiles: [path.resolve(process.cwd(), 'tests/setup.ts')],
    testTimeout: 20000,
  },
});
