import type { CacheBackend } from './types.js'

/**
 * In-process cache. Values are stored and returned as structured clones
 * so callers never share objects with the cache.
 */
export class MemoryCacheBackend implements CacheBackend {
  private readonly raw = new Map<string, string>()
  private readonly values = new Map<string, unknown>()

  async loadRaw(key: string): Promise<string | undefined> {
    return this.raw.get(key)
  }

  async saveRaw(key: string, body: string): Promise<void> {
    this.raw.set(key, body)
  }

  async load(key: string): Promise<unknown> {
    if (!this.values.has(key)) {
      return undefined
    }
    return structuredClone(this.values.get(key))
  }

  async save(key: string, value: unknown): Promise<void> {
    this.values.set(key, structuredClone(value))
  }

  /** Number of raw bodies and values held */
  size(): { raw: number; values: number } {
    return { raw: this.raw.size, values: this.values.size }
  }

  clear(): void {
    this.raw.clear()
    this.values.clear()
  }
}
