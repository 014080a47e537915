import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { MemoryCacheBackend } from '@branchline/cache'
import { formatCell, saveDatasetToCsv, scrapeCsv } from '../csv.js'
import { defineProcessor } from '../../processor.js'
import { StageRegistry } from '../../registry.js'
import { createSilentLogger, FakeTransport, ok } from '../../__tests__/helpers.js'

describe('csv export', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'branchline-csv-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes the fields of the first record as columns', async () => {
    const output = join(dir, 'out.csv')

    const written = await saveDatasetToCsv(
      [
        { name: 'Claw', price: 12 },
        { name: 'Sledge, heavy', price: 40, extra: 'ignored' },
      ],
      output
    )

    expect(written).toBe(2)
    expect(await readFile(output, 'utf8')).toBe('name,price\nClaw,12\n"Sledge, heavy",40\n')
  })

  it('accepts explicit columns and async sources', async () => {
    const output = join(dir, 'out.csv')
    async function* records() {
      yield { name: 'Claw' }
      yield { name: 'Mallet', tags: ['wood'] }
    }

    await saveDatasetToCsv(records(), output, ['name', 'tags'])

    expect(await readFile(output, 'utf8')).toBe('name,tags\nClaw,\nMallet,"[""wood""]"\n')
  })

  it('scrapes into a file with the union of record fields', async () => {
    const output = join(dir, 'tools.csv')
    const list = defineProcessor('list', {
      cacheTemplate: 'tools',
      processFn: () => [
        { processor: 'detail', url: '/claw', name: 'Claw' },
        { processor: 'detail', url: '/mallet', name: 'Mallet' },
      ],
    })
    const detail = defineProcessor('detail', {
      cacheTemplate: 'tools/:name',
      processFn: $ => {
        const weight = $('.weight').text()
        return weight ? { price: $('.price').text(), weight } : { price: $('.price').text() }
      },
    })
    const transport = new FakeTransport(url =>
      url.pathname === '/mallet'
        ? ok('<p class="price">9</p><p class="weight">1kg</p>')
        : ok('<p class="price">12</p>')
    )

    const written = await scrapeCsv([{ processor: 'list', url: 'https://shop.test/' }], output, {
      registry: new StageRegistry().register(list).register(detail),
      transport,
      logger: createSilentLogger(),
      htmlCache: new MemoryCacheBackend(),
      processedCache: new MemoryCacheBackend(),
    })

    expect(written).toBe(2)
    expect(await readFile(output, 'utf8')).toBe('name,price,weight\nClaw,12,\nMallet,9,1kg\n')
    // the second pass is served from cache
    expect(transport.requests).toHaveLength(3)
  })
})

describe('formatCell', () => {
  it('renders values as cell text', () => {
    expect(formatCell(undefined)).toBe('')
    expect(formatCell(null)).toBe('')
    expect(formatCell('x')).toBe('x')
    expect(formatCell(3.5)).toBe('3.5')
    expect(formatCell(false)).toBe('false')
    expect(formatCell(new Date('2024-01-02T03:04:05.000Z'))).toBe('2024-01-02T03:04:05.000Z')
    expect(formatCell({ a: 1 })).toBe('{"a":1}')
  })
})
