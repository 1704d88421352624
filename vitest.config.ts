import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Use globals for describe, it, expect, etc.
    globals: true,

    // Environment for server-side tests
    environment: 'node',

    // Include patterns
    include: ['server/**/*.test.ts', 'shared/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist'],

    // Lifecycle tests wait on real readiness polls
    testTimeout: 30000,

    // Hook timeout
    hookTimeout: 30000,

    // Coverage (optional)
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['server/**/*.ts'],
      exclude: ['**/*.test.ts', 'server/test-utils/**', 'server/index.ts'],
    },
  },
})
