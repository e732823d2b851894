import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['script/**/*.test.ts'],
    environment: 'node',
  },
})
