import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: false,
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'packages/contract/tests/integration.test.ts'],
  },
})
