/**
 * CSV export of leaf records.
 *
 * Records stream through csv-stringify into the output file; only the
 * column list is decided up front.
 */

import { createWriteStream } from 'node:fs'
import { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import { stringify } from 'csv-stringify'
import { scrape } from '../scrape.js'
import type { Context, LeafRecord, ScrapeOptions } from '../types.js'

export type RecordSource = AsyncIterable<LeafRecord> | Iterable<LeafRecord>

export interface ScrapeCsvOptions extends ScrapeOptions {
  /**
   * Scrape twice: once to collect the union of all record fields, then
   * again (served from cache) to write them. Default: true
   */
  allKeys?: boolean
}

/** Cell text: empty for missing values, JSON for structured ones */
export function formatCell(value: unknown): string {
  if (value === undefined || value === null) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value)
  if (value instanceof Date) return value.toISOString()
  return JSON.stringify(value)
}

async function* fromSource(source: RecordSource): AsyncGenerator<LeafRecord, void, undefined> {
  yield* source
}

/**
 * Write records to output as CSV with a header row. Without fields, the
 * columns are the fields of the first record.
 *
 * @returns number of records written
 */
export async function saveDatasetToCsv(
  records: RecordSource,
  output: string,
  fields?: readonly string[]
): Promise<number> {
  const iterator = fromSource(records)
  const first = await iterator.next()
  const columns = fields ? [...fields] : first.done ? [] : Object.keys(first.value)
  let written = 0

  async function* rows(): AsyncGenerator<string[], void, undefined> {
    if (first.done) return
    written += 1
    yield columns.map(column => formatCell(first.value[column]))
    for await (const record of iterator) {
      written += 1
      yield columns.map(column => formatCell(record[column]))
    }
  }

  await pipeline(Readable.from(rows()), stringify({ header: true, columns }), createWriteStream(output))
  return written
}

/**
 * Scrape seed straight into a CSV file.
 *
 * @returns number of records written
 */
export async function scrapeCsv(seed: Context[] | string, output: string, options: ScrapeCsvOptions): Promise<number> {
  const { allKeys = true, ...scrapeOptions } = options

  if (!allKeys) {
    return saveDatasetToCsv(scrape(seed, scrapeOptions), output)
  }

  const fields = new Set<string>()
  for await (const record of scrape(seed, scrapeOptions)) {
    for (const field of Object.keys(record)) {
      fields.add(field)
    }
  }

  // second pass reads what the first one cached
  return saveDatasetToCsv(scrape(seed, { ...scrapeOptions, update: false }), output, [...fields])
}
