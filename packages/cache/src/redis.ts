import type { CacheBackend } from './types.js'

/**
 * The slice of an ioredis client the backend needs.
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<unknown>
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>
}

export interface RedisCacheBackendOptions {
  /** Prepended to every key. Default: branchline: */
  readonly prefix?: string
  /** Expire entries after this many seconds. Default: never */
  readonly ttlSeconds?: number
}

/**
 * Cache shared across processes through Redis. Raw bodies live under
 * `<prefix>raw:<key>`, values as JSON under `<prefix>value:<key>`.
 */
export class RedisCacheBackend implements CacheBackend {
  private readonly client: RedisCacheClient
  private readonly prefix: string
  private readonly ttlSeconds?: number

  constructor(client: RedisCacheClient, options: RedisCacheBackendOptions = {}) {
    this.client = client
    this.prefix = options.prefix ?? 'branchline:'
    this.ttlSeconds = options.ttlSeconds
  }

  async loadRaw(key: string): Promise<string | undefined> {
    const body = await this.client.get(`${this.prefix}raw:${key}`)
    return body ?? undefined
  }

  async saveRaw(key: string, body: string): Promise<void> {
    await this.put(`${this.prefix}raw:${key}`, body)
  }

  async load(key: string): Promise<unknown> {
    const content = await this.client.get(`${this.prefix}value:${key}`)
    if (content === null) {
      return undefined
    }
    return JSON.parse(content)
  }

  async save(key: string, value: unknown): Promise<void> {
    await this.put(`${this.prefix}value:${key}`, JSON.stringify(value))
  }

  private async put(key: string, value: string): Promise<void> {
    if (this.ttlSeconds !== undefined) {
      await this.client.set(key, value, 'EX', this.ttlSeconds)
    } else {
      await this.client.set(key, value)
    }
  }
}
