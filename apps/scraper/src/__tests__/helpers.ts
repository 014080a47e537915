import { vi } from 'vitest'
import type { CheerioAPI } from 'cheerio'
import type { ILogger } from '@branchline/logger'
import { defineProcessor } from '../processor.js'
import { StageRegistry } from '../registry.js'
import type { Context, FetchOutcome, HttpOptions, StageOptions, Transport } from '../types.js'

/**
 * Logger whose methods are spies; children share the parent's spies.
 */
export function createSilentLogger(): ILogger {
  const logger: ILogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => logger),
  }
  return logger
}

export type Responder = (url: URL) => FetchOutcome | Promise<FetchOutcome>

/**
 * In-process transport serving pages from a responder. Records every
 * requested URL.
 */
export class FakeTransport implements Transport {
  readonly requests: string[] = []

  constructor(private readonly respond: Responder) {}

  async fetch(url: string, _options: HttpOptions, _signal?: AbortSignal): Promise<FetchOutcome> {
    this.requests.push(url)
    return this.respond(new URL(url))
  }
}

export function ok(body: string): FetchOutcome {
  return { kind: 'ok', status: 200, body }
}

export function notFound(url: URL): FetchOutcome {
  return { kind: 'definitive', url: url.toString(), status: 404, statusText: 'Not Found' }
}

export const NUMBERS_ORIGIN = 'https://numbers.test'

/**
 * Page /i links to /m for m = 10i + n (n in 0..9, m > 0) while i < 100.
 * Pages 100 and up show "Number i". Starting at /0 there are 900 leaves.
 */
export function numbersSite(url: URL): FetchOutcome {
  const page = Number(url.pathname.slice(1))
  if (!Number.isInteger(page) || url.pathname === '/') {
    return notFound(url)
  }
  if (page >= 100) {
    return ok(`<html><body><h1>Number ${page}</h1></body></html>`)
  }
  const links: string[] = []
  for (let n = 0; n < 10; n++) {
    const target = page * 10 + n
    if (target > 0) {
      links.push(`<a href="/${target}">${target}</a>`)
    }
  }
  return ok(`<html><body>${links.join('')}</body></html>`)
}

/**
 * One stage, `num`, for numbersSite: link pages become `num` children
 * carrying the link text as `n`; number pages become `{ number }`.
 */
export function numbersRegistry(overrides: StageOptions<CheerioAPI> = {}): StageRegistry {
  const num = defineProcessor<CheerioAPI>('num', {
    cacheKeyFn: context => `numbers${new URL(String(context.url)).pathname}`,
    processFn: ($): Context | Context[] => {
      const heading = $('h1')
      if (heading.length > 0) {
        return { number: heading.text() }
      }
      return $('a')
        .toArray()
        .map(a => ({ processor: 'num', url: $(a).attr('href'), n: $(a).text() }))
    },
    ...overrides,
  })
  return new StageRegistry().register(num)
}

export function numbersSeed(): Context[] {
  return [{ processor: 'num', url: `${NUMBERS_ORIGIN}/0`, n: '0' }]
}
