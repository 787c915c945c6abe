/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

// Services run against the real filesystem in temp dirs, so no DOM environment.
export default defineConfig({
  test: {
    environment: 'node',
    include: ['**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**', 'coverage/**'],
    testTimeout: 30000,
    hookTimeout: 30000,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent', // Keep expected-failure tests quiet
    },
  },
});
