import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/__tests__/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist'],

    // Test timeout
    testTimeout: 10000,
    hookTimeout: 10000,

    // Watch mode
    watch: false,

    // Mock reset
    clearMocks: true,
    restoreMocks: true,
  },
});
