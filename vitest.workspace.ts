import { defineWorkspace } from 'vitest/config'

export default defineWorkspace([
  'packages/logger/vitest.config.ts',
  'packages/cache/vitest.config.ts',
  'packages/redis/vitest.config.ts',
  'apps/scraper/vitest.config.ts',
])
