import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Command-backed defaults spawn a shell; give slow CI runners room
    testTimeout: process.env.CI ? 60000 : 30000,
    reporters: ['default'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: ['test/**', 'dist/**'],
    },
  },
});
