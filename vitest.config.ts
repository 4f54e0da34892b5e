/**
 * Vitest Configuration for benchmark-history
 *
 * Runs every unit test under tests/. All tests are in-process: SQLite runs
 * against `:memory:` databases or files in a temp directory.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,

    pool: 'forks',
    fileParallelism: true,
    sequence: {
      shuffle: false, // Keep deterministic order for debugging
    },

    include: ['tests/**/*.test.ts'],

    setupFiles: ['tests/setup.ts'],

    testTimeout: 30000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.d.ts',
        'src/**/index.ts', // Re-export files
      ],
    },
  },
})
