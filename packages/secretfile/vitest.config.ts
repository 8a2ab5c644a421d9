import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'secretfile',
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
})
