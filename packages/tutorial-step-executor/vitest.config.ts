import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true, // Use describe, it, expect without imports
    environment: 'node',
    testTimeout: 30000, // Integration tests spawn real shells
    include: ['__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],
  },
});
