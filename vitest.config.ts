import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test file patterns
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist/**'],

    globals: false,
    environment: 'node',
  },
});
