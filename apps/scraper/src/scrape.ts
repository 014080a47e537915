/**
 * Tree Driver
 *
 * Walks the scrape tree depth-first, in order, and yields leaf records as
 * the consumer pulls them. A stage runs only when the consumer asks for
 * a record that lies beneath it, so taking the first N records fetches
 * only what those N need.
 */

import { createLogger } from '@branchline/logger'
import { getConfig } from './config/env.js'
import { ScrapeAbortedError } from './errors.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { filterContexts, postprocessContexts } from './filter.js'
import { usesFsCache } from './options.js'
import type { Context, LeafRecord, ScrapeOptions } from './types.js'

const log = createLogger('branchline')

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ScrapeAbortedError(signal.reason)
  }
}

function prepare(contexts: Context[], options: ScrapeOptions): Context[] {
  return postprocessContexts(filterContexts(contexts, options), options)
}

async function* expand(
  contexts: Context[],
  options: ScrapeOptions,
  scope: string
): AsyncGenerator<LeafRecord, void, undefined> {
  for (const context of contexts) {
    throwIfAborted(options.signal)

    const { processor, ...input } = context
    if (processor === undefined) {
      const { url: _url, ...leaf } = input
      yield leaf
      continue
    }

    const stage = options.registry.resolve(processor, scope)
    options.logger?.debug('Expanding', { stage: processor, url: input.url })

    const children = await stage.run(input, options)
    // child fields win over inherited ones
    const merged = children.map(child => ({ ...input, ...child }))

    yield* expand(prepare(merged, options), options, scope)
  }
}

/**
 * Run a scrape from root contexts or a registered seed identifier.
 *
 * A seed identifier with a scope (`shop/seed`) makes that scope the
 * default for every stage the run resolves.
 *
 * ```ts
 * for await (const record of scrape('shop/seed', { registry })) {
 *   console.log(record)
 * }
 * ```
 */
export async function* scrape(
  seed: Context[] | string,
  options: ScrapeOptions
): AsyncGenerator<LeafRecord, void, undefined> {
  const run: ScrapeOptions = {
    ...options,
    logger: (options.logger ?? log).child('driver'),
    transport: options.transport ?? new HttpFetcher(),
    // stages that turn the filesystem cache on themselves resolve it lazily
    cacheDir: options.cacheDir ?? (usesFsCache(options) ? getConfig().cacheDir : undefined),
  }

  let scope = options.scope ?? options.registry.defaultScope
  let roots: Context[]

  if (typeof seed === 'string') {
    const resolved = options.registry.resolveSeed(seed, scope)
    scope = resolved.scope
    roots = await resolved.producer()
  } else {
    roots = seed
  }

  yield* expand(prepare(roots, run), run, scope)
}

/**
 * Pass through at most limit records, then close the source.
 */
export async function* take<T>(source: AsyncIterable<T>, limit: number): AsyncGenerator<T, void, undefined> {
  if (limit <= 0) {
    return
  }
  let count = 0
  for await (const record of source) {
    yield record
    count += 1
    if (count >= limit) {
      break
    }
  }
}

/**
 * Drain a record stream into an array, stopping after limit records.
 * Stopping early closes the stream, so no further pages are fetched.
 */
export async function collect<T>(source: AsyncIterable<T>, limit?: number): Promise<T[]> {
  const records: T[] = []
  for await (const record of limit === undefined ? source : take(source, limit)) {
    records.push(record)
  }
  return records
}
