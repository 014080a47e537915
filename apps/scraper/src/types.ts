/**
 * Pipeline Core Types
 *
 * Contexts, stage options, and the tagged outcomes that cross the
 * transport boundary.
 */

import type { CacheBackend } from '@branchline/cache'
import type { ILogger } from '@branchline/logger'
import type { StageRegistry } from './registry.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Contexts
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One unit of pipeline state. Arbitrary data fields plus three reserved
 * ones. Contexts are never mutated; every step derives a new object.
 */
export interface Context {
  [field: string]: unknown

  /** Next stage to run. Absent means this context is a leaf. */
  processor?: string

  /** Address to fetch. Required whenever processor is set. */
  url?: string

  /** Injected by the stage executor before the transform runs */
  cacheKey?: string
}

/**
 * Final pipeline output: a context with no stage left to run and its
 * url removed.
 */
export type LeafRecord = Record<string, unknown>

export type ContextPredicate = (context: Context) => boolean

/** Field subset a context must agree with (see allows) */
export type ContextPattern = Record<string, unknown>

export type ContextFilter = ContextPredicate | ContextPattern | readonly ContextPattern[]

// ═══════════════════════════════════════════════════════════════════════════════
// Transport
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Options handed to the transport untouched.
 */
export interface HttpOptions {
  /** Per-attempt timeout. Default: 5000 */
  timeoutMs?: number
  headers?: Record<string, string>
  redirect?: 'follow' | 'manual' | 'error'
  /** Charset used when the response does not name one. Default: utf-8 */
  charset?: string
}

export interface FetchSuccess {
  kind: 'ok'
  status: number
  body: string
}

/**
 * Well-formed error response. Never retried; routed to the stage's
 * error handler.
 */
export interface DefinitiveFailure {
  kind: 'definitive'
  url: string
  status: number
  statusText: string
  body?: string
}

/**
 * Recoverable transport fault (timeout, dropped connection). Retried up
 * to the stage's retry bound.
 */
export interface TransientFailure {
  kind: 'transient'
  url: string
  reason: 'timeout' | 'network'
  message: string
}

export type FetchOutcome = FetchSuccess | DefinitiveFailure | TransientFailure

/**
 * Fetch capability the engine depends on. Implementations classify every
 * outcome; they only reject when the run itself is cancelled.
 */
export interface Transport {
  fetch(url: string, options: HttpOptions, signal?: AbortSignal): Promise<FetchOutcome>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stage options
// ═══════════════════════════════════════════════════════════════════════════════

export type CacheSetting = boolean | CacheBackend

/**
 * Turns a definitive failure into replacement child contexts, or throws
 * to abort the run.
 */
export type ErrorHandler = (
  url: string,
  failure: DefinitiveFailure,
  logger: ILogger
) => Context[] | Promise<Context[]>

export type ProcessResult = Context | Context[]

/**
 * Options a stage can declare and a caller can pass for a whole run.
 * Precedence: stage-declared > call-scoped > DEFAULT_STAGE_OPTIONS.
 *
 * D is the parsed document type handed from parseFn to processFn.
 */
export interface StageOptions<D = unknown> {
  /** Template such as `products/:category/:page` */
  cacheTemplate?: string

  /** Derives the cache key; wins over cacheTemplate */
  cacheKeyFn?: (context: Context) => string

  errorHandler?: ErrorHandler

  /** true: default directory, false/unset: no caching, instance: used as is */
  htmlCache?: CacheSetting
  processedCache?: CacheSetting

  parseFn?(body: string, context: Context): D | Promise<D>
  processFn?(document: D, context: Context): ProcessResult | Promise<ProcessResult>

  /** Maximum transport attempts */
  retries?: number

  /** Base delay between transient failures, doubled per attempt. Default: 0 */
  retryDelayMs?: number

  /** Stage opts in to forced refresh when the run sets update */
  updatable?: boolean

  /** Call-scoped: refetch and reprocess updatable stages */
  update?: boolean

  urlFn?: (context: Context) => string | undefined

  only?: ContextFilter

  postprocess?: (contexts: Context[]) => Context[]

  httpOptions?: HttpOptions
}

/**
 * Call-scoped options for a run: stage option overrides plus the run's
 * collaborators.
 */
export interface ScrapeOptions extends StageOptions {
  registry: StageRegistry

  /** Scope bare stage identifiers resolve against */
  scope?: string

  transport?: Transport

  logger?: ILogger

  /** Root for the default filesystem caches */
  cacheDir?: string

  /** Cancels the run and in-flight fetches */
  signal?: AbortSignal
}

/**
 * A registered unit of work: fetch one resource, transform it, yield
 * child contexts.
 */
export interface Stage {
  readonly name: string
  readonly options: StageOptions
  run(context: Context, options: ScrapeOptions): Promise<Context[]>
}

export type SeedProducer = () => Context[] | Promise<Context[]>
