import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
  },
});
