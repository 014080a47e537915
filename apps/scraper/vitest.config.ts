import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const root = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  test: {
    name: 'scraper',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@branchline/logger': resolve(root, '../../packages/logger/src/index.ts'),
      '@branchline/cache': resolve(root, '../../packages/cache/src/index.ts'),
      '@branchline/redis': resolve(root, '../../packages/redis/src/index.ts'),
    },
  },
})
