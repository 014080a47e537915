/**
 * @branchline/cache
 *
 * Key/value cache backends for page bodies and processed stage results.
 */

export type { CacheBackend } from './types.js'
export { isCacheBackend } from './types.js'
export { NullCacheBackend } from './null.js'
export { MemoryCacheBackend } from './memory.js'
export { FsCacheBackend } from './fs.js'
export type { FsCacheBackendOptions } from './fs.js'
export { RedisCacheBackend } from './redis.js'
export type { RedisCacheClient, RedisCacheBackendOptions } from './redis.js'
