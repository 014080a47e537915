import { describe, expect, it, vi } from 'vitest'
import { RedisCacheBackend, type RedisCacheClient } from '../redis.js'

function createFakeClient() {
  const store = new Map<string, string>()
  const set = vi.fn(async (key: string, value: string, ..._expiry: unknown[]) => {
    store.set(key, value)
    return 'OK'
  })
  const client: RedisCacheClient = {
    get: async (key: string) => store.get(key) ?? null,
    set,
  }
  return { client, store, set }
}

describe('RedisCacheBackend', () => {
  it('prefixes raw and value keys separately', async () => {
    const { client, store } = createFakeClient()
    const cache = new RedisCacheBackend(client, { prefix: 'test:' })

    await cache.saveRaw('page', '<html></html>')
    await cache.save('page', [{ n: 1 }])

    expect(store.get('test:raw:page')).toBe('<html></html>')
    expect(store.get('test:value:page')).toBe('[{"n":1}]')
    expect(await cache.loadRaw('page')).toBe('<html></html>')
    expect(await cache.load('page')).toEqual([{ n: 1 }])
  })

  it('maps a missing key to undefined', async () => {
    const cache = new RedisCacheBackend(createFakeClient().client)

    expect(await cache.loadRaw('absent')).toBeUndefined()
    expect(await cache.load('absent')).toBeUndefined()
  })

  it('passes the TTL to SET', async () => {
    const { client, set } = createFakeClient()
    const cache = new RedisCacheBackend(client, { ttlSeconds: 60 })

    await cache.saveRaw('page', 'body')

    expect(set).toHaveBeenCalledWith('branchline:raw:page', 'body', 'EX', 60)
  })
})
