/**
 * HTTP Transport
 *
 * Single-attempt transport over the native fetch API. Classifies each
 * outcome once, at this boundary:
 * - 2xx: ok
 * - any other status: definitive (never retried)
 * - timeout or network error: transient
 *
 * Retries and caching live in download(); this class makes one request.
 */

import { TextDecoder } from 'node:util'

import { ScrapeAbortedError } from '../errors.js'
import type { FetchOutcome, HttpOptions, Transport } from '../types.js'

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  'User-Agent': 'Mozilla/5.0 (compatible; Branchline/1.0)',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
}

export const DEFAULT_HTTP_OPTIONS: Required<Omit<HttpOptions, 'headers'>> = {
  timeoutMs: 5000,
  redirect: 'follow',
  charset: 'utf-8',
}

export interface HttpFetcherOptions {
  /** Headers sent with every request, merged under per-call headers */
  headers?: Record<string, string>
}

/**
 * Pull the charset parameter out of a Content-Type header.
 */
export function charsetFromContentType(contentType: string | null): string | undefined {
  if (!contentType) return undefined
  const match = contentType.match(/charset\s*=\s*"?([^";\s]+)"?/i)
  return match ? match[1].toLowerCase() : undefined
}

export class HttpFetcher implements Transport {
  private readonly headers: Record<string, string>

  constructor(options: HttpFetcherOptions = {}) {
    this.headers = { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) }
  }

  async fetch(url: string, options: HttpOptions = {}, signal?: AbortSignal): Promise<FetchOutcome> {
    if (signal?.aborted) {
      throw new ScrapeAbortedError(signal.reason)
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_OPTIONS.timeoutMs
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onAbort = (): void => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { ...this.headers, ...(options.headers ?? {}) },
        signal: controller.signal,
        redirect: options.redirect ?? DEFAULT_HTTP_OPTIONS.redirect,
      })

      const body = await this.readBody(response, options.charset ?? DEFAULT_HTTP_OPTIONS.charset)

      if (!response.ok) {
        return {
          kind: 'definitive',
          url,
          status: response.status,
          statusText: response.statusText,
          body,
        }
      }

      return { kind: 'ok', status: response.status, body }
    } catch (error) {
      if (signal?.aborted) {
        throw new ScrapeAbortedError(signal.reason)
      }

      if (timedOut) {
        return {
          kind: 'transient',
          url,
          reason: 'timeout',
          message: `Request timed out after ${timeoutMs}ms`,
        }
      }

      // fetch() rejects with TypeError for DNS, connection and stream failures
      if (error instanceof TypeError) {
        return { kind: 'transient', url, reason: 'network', message: error.message }
      }

      throw error
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }
  }

  /**
   * Decode the body with the response charset, falling back to the
   * configured one and then UTF-8 for labels TextDecoder does not know.
   */
  private async readBody(response: Response, fallbackCharset: string): Promise<string> {
    const buffer = await response.arrayBuffer()
    const charset = charsetFromContentType(response.headers.get('content-type')) ?? fallbackCharset

    let decoder: TextDecoder
    try {
      decoder = new TextDecoder(charset)
    } catch {
      decoder = new TextDecoder('utf-8')
    }
    return decoder.decode(buffer)
  }
}
