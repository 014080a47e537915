/**
 * Stage option resolution.
 *
 * Each stage invocation resolves one explicit options record from three
 * layers, highest first: stage-declared, call-scoped, defaults. Unset
 * (undefined) values never shadow a lower layer.
 */

import { FsCacheBackend, isCacheBackend, NullCacheBackend } from '@branchline/cache'
import type { CacheBackend } from '@branchline/cache'
import type { ILogger } from '@branchline/logger'
import { DefinitiveFetchError } from './errors.js'
import { DEFAULT_HTTP_OPTIONS } from './fetch/http-fetcher.js'
import { isCheerioDocument, loadHtml } from './parse/html.js'
import type {
  CacheSetting,
  Context,
  DefinitiveFailure,
  ErrorHandler,
  HttpOptions,
  ProcessResult,
  StageOptions,
} from './types.js'

/**
 * Prunes the subtree on 404 and aborts the run on any other status.
 */
export function defaultErrorHandler(url: string, failure: DefinitiveFailure, logger: ILogger): Context[] {
  if (failure.status === 404) {
    logger.warn('Download returned 404 Not Found, pruning scrape tree', { url })
    return []
  }
  throw new DefinitiveFetchError(url, failure.status, failure.statusText)
}

/**
 * Keeps the page as the single child. A cheerio document is stored as
 * its serialized HTML.
 */
export function defaultProcessFn(document: unknown): ProcessResult {
  return { resource: isCheerioDocument(document) ? document.html() : document }
}

export function defaultUrlFn(context: Context): string | undefined {
  return context.url
}

export interface ResolvedStageOptions {
  cacheTemplate?: string
  cacheKeyFn?: (context: Context) => string
  errorHandler: ErrorHandler
  htmlCache: CacheSetting
  processedCache: CacheSetting
  parseFn: (body: string, context: Context) => unknown
  processFn: (document: unknown, context: Context) => ProcessResult | Promise<ProcessResult>
  retries: number
  retryDelayMs: number
  updatable: boolean
  update: boolean
  urlFn: (context: Context) => string | undefined
  httpOptions: HttpOptions
}

export const DEFAULT_STAGE_OPTIONS = {
  errorHandler: defaultErrorHandler,
  htmlCache: true,
  processedCache: true,
  parseFn: loadHtml,
  processFn: defaultProcessFn,
  retries: 5,
  retryDelayMs: 0,
  updatable: false,
  update: false,
  urlFn: defaultUrlFn,
  httpOptions: DEFAULT_HTTP_OPTIONS,
} satisfies Omit<ResolvedStageOptions, 'cacheTemplate' | 'cacheKeyFn'>

function firstDefined<K extends keyof StageOptions>(
  layers: ReadonlyArray<StageOptions | undefined>,
  key: K
): StageOptions[K] | undefined {
  for (const layer of layers) {
    const value = layer?.[key]
    if (value !== undefined) {
      return value
    }
  }
  return undefined
}

function mergeHttpOptions(layers: ReadonlyArray<StageOptions | undefined>): HttpOptions {
  const merged: HttpOptions = { ...DEFAULT_HTTP_OPTIONS }
  let headers: Record<string, string> | undefined

  // lowest layer first so higher layers overwrite
  for (const layer of [...layers].reverse()) {
    const options = layer?.httpOptions
    if (!options) continue
    if (options.timeoutMs !== undefined) merged.timeoutMs = options.timeoutMs
    if (options.redirect !== undefined) merged.redirect = options.redirect
    if (options.charset !== undefined) merged.charset = options.charset
    if (options.headers) headers = { ...headers, ...options.headers }
  }

  return headers ? { ...merged, headers } : merged
}

/**
 * Resolve the options one stage invocation runs with.
 */
export function resolveStageOptions(
  callOptions: StageOptions | undefined,
  stageOptions: StageOptions | undefined
): ResolvedStageOptions {
  const layers = [stageOptions, callOptions]
  const parseFn = firstDefined(layers, 'parseFn')
  const processFn = firstDefined(layers, 'processFn')

  return {
    cacheTemplate: firstDefined(layers, 'cacheTemplate'),
    cacheKeyFn: firstDefined(layers, 'cacheKeyFn'),
    errorHandler: firstDefined(layers, 'errorHandler') ?? DEFAULT_STAGE_OPTIONS.errorHandler,
    htmlCache: firstDefined(layers, 'htmlCache') ?? DEFAULT_STAGE_OPTIONS.htmlCache,
    processedCache: firstDefined(layers, 'processedCache') ?? DEFAULT_STAGE_OPTIONS.processedCache,
    parseFn: parseFn ? (body, context) => parseFn(body, context) : DEFAULT_STAGE_OPTIONS.parseFn,
    processFn: processFn ? (document, context) => processFn(document, context) : DEFAULT_STAGE_OPTIONS.processFn,
    retries: firstDefined(layers, 'retries') ?? DEFAULT_STAGE_OPTIONS.retries,
    retryDelayMs: firstDefined(layers, 'retryDelayMs') ?? DEFAULT_STAGE_OPTIONS.retryDelayMs,
    updatable: firstDefined(layers, 'updatable') ?? DEFAULT_STAGE_OPTIONS.updatable,
    update: firstDefined(layers, 'update') ?? DEFAULT_STAGE_OPTIONS.update,
    urlFn: firstDefined(layers, 'urlFn') ?? DEFAULT_STAGE_OPTIONS.urlFn,
    httpOptions: mergeHttpOptions(layers),
  }
}

/**
 * true selects the filesystem cache under directory(); false or unset
 * disables caching; an instance is used as given. directory is only
 * called for the filesystem cache.
 */
export function resolveCache(setting: CacheSetting, directory: () => string): CacheBackend {
  if (setting === true) {
    return new FsCacheBackend(directory())
  }
  if (isCacheBackend(setting)) {
    return setting
  }
  return new NullCacheBackend()
}

/**
 * True when either cache setting leaves the filesystem cache in play.
 */
export function usesFsCache(options: Pick<StageOptions, 'htmlCache' | 'processedCache'>): boolean {
  return (options.htmlCache ?? DEFAULT_STAGE_OPTIONS.htmlCache) === true ||
    (options.processedCache ?? DEFAULT_STAGE_OPTIONS.processedCache) === true
}
