import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const verbose = process.env.VITEST_VERBOSE === 'true'

export default defineConfig({
  root: fileURLToPath(new URL('.', import.meta.url)),
  resolve: {
    conditions: ['source', 'module', 'import', 'default'],
  },
  test: {
    globals: false,
    include: ['test/**/*.test.ts'],
    reporters: ['default'],
    silent: !verbose,
    testTimeout: 10_000,
  },
})
