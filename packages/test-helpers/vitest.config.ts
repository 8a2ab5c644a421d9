import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'test-helpers',
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
})
