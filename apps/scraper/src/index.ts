export type {
  CacheSetting,
  Context,
  ContextFilter,
  ContextPattern,
  ContextPredicate,
  DefinitiveFailure,
  ErrorHandler,
  FetchOutcome,
  FetchSuccess,
  HttpOptions,
  LeafRecord,
  ProcessResult,
  ScrapeOptions,
  SeedProducer,
  Stage,
  StageOptions,
  TransientFailure,
  Transport,
} from './types.js'

export {
  ScrapeError,
  DefinitiveFetchError,
  RetriesExhaustedError,
  UnknownStageError,
  TemplateFieldError,
  InvalidStageOutputError,
  ScrapeAbortedError,
  SCRAPE_ERROR_CODES,
  classifyError,
} from './errors.js'
export type { ClassifiedError, ScrapeErrorCode, ScrapeErrorKind } from './errors.js'

export { getConfig, loadEnv } from './config/env.js'
export type { BranchlineConfig } from './config/env.js'

export { HttpFetcher, DEFAULT_FETCH_HEADERS, DEFAULT_HTTP_OPTIONS } from './fetch/http-fetcher.js'
export { download } from './fetch/download.js'
export type { DownloadOptions, DownloadResult } from './fetch/download.js'

export { DEFAULT_STAGE_OPTIONS, defaultErrorHandler, resolveStageOptions } from './options.js'
export { defineProcessor, runProcessor, computeCacheKey } from './processor.js'
export { StageRegistry, DEFAULT_SCOPE, qualify } from './registry.js'
export { scrape, collect, take } from './scrape.js'
export { allows, filterContexts, postprocessContexts } from './filter.js'

export { loadHtml, firstText, firstAttr, href } from './parse/html.js'
export { formatTemplate, templateFields } from './utils/template.js'
export { mergeUrls } from './utils/url.js'
export { uncompressTree } from './utils/tree.js'
export type { CompressedTree } from './utils/tree.js'

export { saveDatasetToCsv, scrapeCsv } from './export/csv.js'
export type { ScrapeCsvOptions } from './export/csv.js'

export {
  FsCacheBackend,
  MemoryCacheBackend,
  NullCacheBackend,
  RedisCacheBackend,
  isCacheBackend,
} from '@branchline/cache'
export type { CacheBackend } from '@branchline/cache'
