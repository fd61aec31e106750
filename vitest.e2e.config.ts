import { defineConfig } from 'vitest/config'

// Needs TEST_PG_URL; every suite is skipped without it.
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 60000,
    hookTimeout: 60000,
    include: ['tests/e2e/**/*.e2e.test.ts'],
    fileParallelism: false,
  },
})
