/**
 * Fetch-with-retry
 *
 * Cache-aside read of the raw page body, then up to `retries` transport
 * attempts. Transient failures are logged and retried; a definitive
 * failure is returned to the caller as a value on first sight; the first
 * success is written to the HTML cache and returned.
 */

import type { CacheBackend } from '@branchline/cache'
import type { ILogger } from '@branchline/logger'
import { RetriesExhaustedError, ScrapeAbortedError, ScrapeError, SCRAPE_ERROR_CODES } from '../errors.js'
import type { DefinitiveFailure, HttpOptions, TransientFailure, Transport } from '../types.js'

const MAX_RETRY_DELAY_MS = 30000

export interface DownloadOptions {
  transport: Transport
  retries: number
  retryDelayMs?: number
  httpOptions?: HttpOptions
  logger: ILogger
  signal?: AbortSignal
}

export interface Downloaded {
  kind: 'ok'
  body: string
  fromCache: boolean
}

export type DownloadResult = Downloaded | DefinitiveFailure

/**
 * Exponential delay before the attempt after `attempt`, capped at 30s.
 * Zero base means no delay.
 */
export function retryDelay(baseMs: number, attempt: number): number {
  if (baseMs <= 0) return 0
  return Math.min(baseMs * Math.pow(2, attempt - 1), MAX_RETRY_DELAY_MS)
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timeoutId)
      reject(new ScrapeAbortedError(signal?.reason))
    }
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Download url, serving from htmlCache when cacheKey is set and force
 * is not.
 *
 * @throws RetriesExhaustedError when every attempt fails transiently
 */
export async function download(
  url: string,
  cacheKey: string | undefined,
  htmlCache: CacheBackend,
  force: boolean,
  options: DownloadOptions
): Promise<DownloadResult> {
  const { transport, retries, logger, signal } = options

  if (!Number.isInteger(retries) || retries < 1) {
    throw new ScrapeError(
      'fatal',
      SCRAPE_ERROR_CODES.CONFIGURATION_ERROR,
      `retries must be a positive integer, got ${retries}`
    )
  }

  if (cacheKey !== undefined && !force) {
    const cached = await htmlCache.loadRaw(cacheKey)
    if (cached !== undefined) {
      return { kind: 'ok', body: cached, fromCache: true }
    }
  }

  logger.info('Downloading', { url, cacheKey })

  let lastFailure: TransientFailure | undefined

  for (let attempt = 1; attempt <= retries; attempt++) {
    if (signal?.aborted) {
      throw new ScrapeAbortedError(signal.reason)
    }

    const outcome = await transport.fetch(url, options.httpOptions ?? {}, signal)

    if (outcome.kind === 'definitive') {
      return outcome
    }

    if (outcome.kind === 'ok') {
      if (cacheKey !== undefined) {
        await htmlCache.saveRaw(cacheKey, outcome.body)
      }
      return { kind: 'ok', body: outcome.body, fromCache: false }
    }

    lastFailure = outcome
    logger.warn('Transient failure while downloading, retrying', {
      url,
      attempt,
      retries,
      reason: outcome.reason,
      detail: outcome.message,
    })

    const delayMs = retryDelay(options.retryDelayMs ?? 0, attempt)
    if (attempt < retries && delayMs > 0) {
      await sleep(delayMs, signal)
    }
  }

  throw new RetriesExhaustedError(url, retries, lastFailure?.message)
}
