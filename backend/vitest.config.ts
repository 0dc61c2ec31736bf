import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

export default defineConfig({
  test: {
    root: dirname(fileURLToPath(import.meta.url)),
    environment: 'node',
    globals: true, // So we don't need to import describe, it, etc.
    include: ['src/**/*.test.ts'],
  },
});
