import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['src/**/*.int.test.ts'],
    testTimeout: 5000,
    hookTimeout: 5000,
    fileParallelism: true,
  },
})
