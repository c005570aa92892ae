import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    benchmark: {
      include: ['packages/*/test/**/*.bench.ts'],
    },
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
})
