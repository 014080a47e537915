/**
 * Stage Executor
 *
 * Runs one stage against one context: derive the cache key, serve a
 * processed-cache hit, otherwise download (cache-aside, with retries),
 * parse, transform, normalize and store the child contexts.
 */

import { join } from 'node:path'
import type { CheerioAPI } from 'cheerio'
import { createLogger } from '@branchline/logger'
import type { ILogger } from '@branchline/logger'
import { z } from 'zod'
import { getConfig } from './config/env.js'
import { InvalidStageOutputError, ScrapeError, SCRAPE_ERROR_CODES } from './errors.js'
import { download } from './fetch/download.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { resolveCache, resolveStageOptions } from './options.js'
import type { ResolvedStageOptions } from './options.js'
import type { Context, ProcessResult, ScrapeOptions, Stage, StageOptions } from './types.js'
import { formatTemplate } from './utils/template.js'
import { mergeUrls } from './utils/url.js'

const log = createLogger('branchline')

const CachedContextsSchema = z.array(
  z
    .object({
      processor: z.string().optional(),
      url: z.string().optional(),
      cacheKey: z.string().optional(),
    })
    .passthrough()
)

/**
 * cacheKeyFn wins over cacheTemplate; neither means no key.
 */
export function computeCacheKey(
  options: Pick<ResolvedStageOptions, 'cacheKeyFn' | 'cacheTemplate'>,
  context: Context
): string | undefined {
  if (options.cacheKeyFn) {
    return options.cacheKeyFn(context)
  }
  if (options.cacheTemplate !== undefined) {
    return formatTemplate(options.cacheTemplate, context)
  }
  return undefined
}

function parseCachedContexts(value: unknown, cacheKey: string): Context[] {
  const parsed = CachedContextsSchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidStageOutputError(`Processed cache entry '${cacheKey}' is not a list of contexts`)
  }
  return parsed.data
}

/**
 * Plain JSON data: what every cache backend stores and returns unchanged.
 * Object fields may be undefined; JSON drops them.
 */
export function isJsonSafe(value: unknown): boolean {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true
  }
  if (typeof value === 'number') {
    return Number.isFinite(value)
  }
  if (Array.isArray(value)) {
    return value.every(isJsonSafe)
  }
  if (typeof value === 'object') {
    const prototype: unknown = Object.getPrototypeOf(value)
    if (prototype !== Object.prototype && prototype !== null) {
      return false
    }
    return Object.values(value).every(item => item === undefined || isJsonSafe(item))
  }
  return false
}

function hasUrl(context: Context): boolean {
  return typeof context.url === 'string' && context.url !== ''
}

/**
 * Wrap a single result, drop children that name a stage but no URL, and
 * resolve relative child URLs against the page URL.
 */
export function normalizeResult(result: ProcessResult, baseUrl: string, logger: ILogger): Context[] {
  const contexts = Array.isArray(result) ? result : [result]
  const normalized: Context[] = []

  for (const context of contexts) {
    if (context.processor !== undefined && !hasUrl(context)) {
      logger.warn('Context has a processor but no URL, skipping', { processor: context.processor })
      continue
    }
    normalized.push(
      typeof context.url === 'string' && context.url !== ''
        ? { ...context, url: mergeUrls(baseUrl, context.url) }
        : context
    )
  }

  return normalized
}

/**
 * Execute stage `name` for inputContext. Call options override defaults;
 * stageOptions override both.
 *
 * @throws RetriesExhaustedError when every transport attempt fails transiently
 * @throws InvalidStageOutputError when a cached stage returns non-JSON data
 * @throws whatever the error handler throws for a definitive failure
 */
export async function runProcessor(
  name: string,
  inputContext: Context,
  callOptions: ScrapeOptions,
  stageOptions: StageOptions = {}
): Promise<Context[]> {
  const options = resolveStageOptions(callOptions, stageOptions)
  const logger = (callOptions.logger ?? log).child('processor', { stage: name })
  // the environment is consulted only for a filesystem cache with no cacheDir
  const cacheDir = (): string => callOptions.cacheDir ?? getConfig().cacheDir
  const htmlCache = resolveCache(options.htmlCache, () => join(cacheDir(), 'html'))
  const processedCache = resolveCache(options.processedCache, () => join(cacheDir(), 'processed'))

  const cacheKey = computeCacheKey(options, inputContext)
  const force = options.update && options.updatable

  if (cacheKey !== undefined && !force) {
    const cached = await processedCache.load(cacheKey)
    if (cached !== undefined) {
      logger.debug('Processed cache hit', { cacheKey })
      return parseCachedContexts(cached, cacheKey)
    }
  }

  const url = options.urlFn(inputContext)
  if (!url) {
    throw new ScrapeError('fatal', SCRAPE_ERROR_CODES.CONFIGURATION_ERROR, `Stage '${name}' has no URL to fetch`)
  }

  const context: Context = cacheKey !== undefined ? { ...inputContext, url, cacheKey } : { ...inputContext, url }

  const downloaded = await download(url, cacheKey, htmlCache, force, {
    transport: callOptions.transport ?? new HttpFetcher(),
    retries: options.retries,
    retryDelayMs: options.retryDelayMs,
    httpOptions: options.httpOptions,
    logger: logger.child('fetch'),
    signal: callOptions.signal,
  })

  let children: Context[]
  if (downloaded.kind === 'definitive') {
    children = await options.errorHandler(url, downloaded, logger)
  } else {
    const document = await options.parseFn(downloaded.body, context)
    children = normalizeResult(await options.processFn(document, context), url, logger)
  }

  if (cacheKey !== undefined) {
    if (!children.every(isJsonSafe)) {
      throw new InvalidStageOutputError(
        `Stage '${name}' returned contexts that cannot be cached under '${cacheKey}': only plain JSON data is allowed`
      )
    }
    await processedCache.save(cacheKey, children)
  } else {
    logger.info('Not caching since no cache template or key function is set', { url })
  }

  return children
}

/**
 * Declare a stage. D is the document parseFn produces (a cheerio
 * document unless parseFn says otherwise).
 *
 * ```ts
 * const category = defineProcessor('category', {
 *   cacheTemplate: 'shop/:category',
 *   processFn: ($, context) => $('a.product').map((_i, a) => ({
 *     processor: 'product',
 *     url: $(a).attr('href'),
 *   })).get(),
 * })
 * ```
 */
export function defineProcessor<D = CheerioAPI>(name: string, options: StageOptions<D> = {}): Stage {
  return {
    name,
    options,
    run: (context, callOptions) => runProcessor(name, context, callOptions, options),
  }
}
