import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'auth',
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/**/index.ts']
    },
    fileParallelism: false,
    sequence: {
      concurrent: false
    }
  }
})
