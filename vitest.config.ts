import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Use globals for describe, it, expect, etc.
    globals: true,

    environment: 'node',

    include: ['shared/**/*.test.ts', 'server/**/*.test.ts', 'agent/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    // Certificate generation and the proxy round trips take a while
    testTimeout: 30000,

    hookTimeout: 30000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['shared/**/*.ts', 'server/**/*.ts', 'agent/**/*.ts'],
      exclude: ['**/*.test.ts', '**/test-utils/**'],
    },
  },
})
