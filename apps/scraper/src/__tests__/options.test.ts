import { describe, expect, it, vi } from 'vitest'
import { FsCacheBackend, MemoryCacheBackend, NullCacheBackend } from '@branchline/cache'
import { defaultErrorHandler, defaultProcessFn, resolveCache, resolveStageOptions, usesFsCache } from '../options.js'
import { loadHtml } from '../parse/html.js'
import { DefinitiveFetchError } from '../errors.js'
import { createSilentLogger } from './helpers.js'

describe('resolveStageOptions', () => {
  it('falls back to defaults', () => {
    const options = resolveStageOptions({}, {})

    expect(options.retries).toBe(5)
    expect(options.htmlCache).toBe(true)
    expect(options.processedCache).toBe(true)
    expect(options.update).toBe(false)
    expect(options.cacheTemplate).toBeUndefined()
    expect(options.urlFn({ url: 'https://shop.test/' })).toBe('https://shop.test/')
    expect(options.httpOptions).toEqual({ timeoutMs: 5000, redirect: 'follow', charset: 'utf-8' })
  })

  it('lets stage options win over call options', () => {
    const options = resolveStageOptions({ retries: 3, update: true }, { retries: 1 })

    expect(options.retries).toBe(1)
    expect(options.update).toBe(true)
  })

  it('ignores options set to undefined', () => {
    const options = resolveStageOptions({ retries: 3 }, { retries: undefined })

    expect(options.retries).toBe(3)
  })

  it('merges http options field by field', () => {
    const options = resolveStageOptions(
      { httpOptions: { timeoutMs: 1000, headers: { 'X-Run': 'nightly', Accept: 'text/html' } } },
      { httpOptions: { headers: { Accept: 'application/json' } } }
    )

    expect(options.httpOptions).toEqual({
      timeoutMs: 1000,
      redirect: 'follow',
      charset: 'utf-8',
      headers: { 'X-Run': 'nightly', Accept: 'application/json' },
    })
  })

  it('defaults the transform to wrapping the document', async () => {
    const options = resolveStageOptions({}, {})

    expect(await options.processFn('doc', {})).toEqual({ resource: 'doc' })
    expect(await options.processFn(options.parseFn('<b>x</b>', {}), {})).toEqual({
      resource: '<html><head></head><body><b>x</b></body></html>',
    })
  })
})

describe('resolveCache', () => {
  it('maps settings to backends', () => {
    const memory = new MemoryCacheBackend()
    const directory = () => '/tmp/branchline-html'

    expect(resolveCache(true, directory)).toBeInstanceOf(FsCacheBackend)
    expect(resolveCache(false, directory)).toBeInstanceOf(NullCacheBackend)
    expect(resolveCache(memory, directory)).toBe(memory)
  })

  it('asks for a directory only for the filesystem cache', () => {
    const directory = vi.fn(() => '/tmp/branchline-html')

    resolveCache(false, directory)
    resolveCache(new MemoryCacheBackend(), directory)

    expect(directory).not.toHaveBeenCalled()
  })
})

describe('usesFsCache', () => {
  it('is true unless both settings turn the filesystem cache off', () => {
    expect(usesFsCache({})).toBe(true)
    expect(usesFsCache({ htmlCache: false })).toBe(true)
    expect(usesFsCache({ htmlCache: false, processedCache: new MemoryCacheBackend() })).toBe(false)
  })
})

describe('defaultProcessFn', () => {
  it('stores a cheerio document as its HTML', () => {
    const $ = loadHtml('<p>Claw</p>')

    expect(defaultProcessFn($)).toEqual({ resource: '<html><head></head><body><p>Claw</p></body></html>' })
  })

  it('passes other documents through', () => {
    expect(defaultProcessFn({ rows: 2 })).toEqual({ resource: { rows: 2 } })
  })
})

describe('defaultErrorHandler', () => {
  const failure = (status: number, statusText: string) =>
    ({ kind: 'definitive', url: 'https://shop.test/x', status, statusText }) as const

  it('prunes on 404', () => {
    const logger = createSilentLogger()

    expect(defaultErrorHandler('https://shop.test/x', failure(404, 'Not Found'), logger)).toEqual([])
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  it('throws for other statuses', () => {
    expect(() => defaultErrorHandler('https://shop.test/x', failure(410, 'Gone'), createSilentLogger())).toThrow(
      DefinitiveFetchError
    )
    expect(() => defaultErrorHandler('https://shop.test/x', failure(500, ''), createSilentLogger())).toThrow(
      'HTTP 500: https://shop.test/x'
    )
  })
})
