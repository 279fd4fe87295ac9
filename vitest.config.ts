import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/tests/**/*.test.ts'],
    // Lease and visibility tests wait on wall-clock time
    testTimeout: 15000,
  },
})
