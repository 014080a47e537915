import type { CacheBackend } from './types.js'

/**
 * Backend that stores nothing. Used when a cache option is false or unset.
 */
export class NullCacheBackend implements CacheBackend {
  async loadRaw(_key: string): Promise<string | undefined> {
    return undefined
  }

  async saveRaw(_key: string, _body: string): Promise<void> {}

  async load(_key: string): Promise<unknown> {
    return undefined
  }

  async save(_key: string, _value: unknown): Promise<void> {}
}
