import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    reporters: ['default'],
    clearMocks: true,
    restoreMocks: true,
    testTimeout: 10000,
  },
});
