import { describe, expect, it } from 'vitest'
import { qualify, StageRegistry } from '../registry.js'
import { defineProcessor } from '../processor.js'
import { ScrapeError, UnknownStageError } from '../errors.js'

describe('qualify', () => {
  it('splits at the last slash', () => {
    expect(qualify('shop/books/list')).toEqual({ scope: 'shop/books', name: 'list', id: 'shop/books/list' })
  })

  it('places bare names in the default scope', () => {
    expect(qualify('list', 'shop')).toEqual({ scope: 'shop', name: 'list', id: 'shop/list' })
    expect(qualify('list')).toEqual({ scope: 'default', name: 'list', id: 'default/list' })
  })
})

describe('StageRegistry', () => {
  const list = defineProcessor('list')
  const detail = defineProcessor('detail')

  it('resolves qualified and bare identifiers', () => {
    const registry = new StageRegistry().register(list, 'shop').register(detail)

    expect(registry.resolve('shop/list')).toBe(list)
    expect(registry.resolve('list', 'shop')).toBe(list)
    expect(registry.resolve('detail')).toBe(detail)
    expect(registry.list()).toEqual(['default/detail', 'shop/list'])
  })

  it('fails on unknown identifiers', () => {
    const registry = new StageRegistry().register(list)

    expect(() => registry.resolve('missing')).toThrow(UnknownStageError)
    expect(() => registry.resolve('missing')).toThrow('Unable to resolve processor: missing')
    expect(registry.has('list')).toBe(true)
    expect(registry.has('other/list')).toBe(false)
  })

  it('refuses duplicate and malformed names', () => {
    const registry = new StageRegistry().register(list)

    expect(() => registry.register(defineProcessor('list'))).toThrow("Stage 'default/list' is already registered")
    expect(() => registry.register(defineProcessor('a/b'))).toThrow(ScrapeError)
    expect(() => registry.register(defineProcessor(''))).toThrow(ScrapeError)
  })

  it('uses its own default scope', () => {
    const registry = new StageRegistry({ defaultScope: 'shop' }).register(list)

    expect(registry.list()).toEqual(['shop/list'])
    expect(registry.resolve('list')).toBe(list)
  })

  it('resolves seeds with their scope', async () => {
    const registry = new StageRegistry().registerSeed('seed', () => [{ url: 'https://shop.test/' }], 'shop')

    const { producer, scope } = registry.resolveSeed('shop/seed')

    expect(scope).toBe('shop')
    expect(await producer()).toEqual([{ url: 'https://shop.test/' }])
    expect(registry.listSeeds()).toEqual(['shop/seed'])
    expect(() => registry.resolveSeed('seed')).toThrow(UnknownStageError)
  })

  it('validates the stages contexts refer to', () => {
    const registry = new StageRegistry().register(list)

    expect(() => registry.validate([{ processor: 'list', url: 'https://shop.test/' }, { title: 'leaf' }])).not.toThrow()
    expect(() => registry.validate([{ processor: 'detail', url: 'https://shop.test/' }])).toThrow(
      'Unable to resolve processor: detail'
    )
  })
})
