import { createLogger, setLogLevel } from '@branchline/logger'
import type { ILogger } from '@branchline/logger'
import { MemoryCacheBackend, RedisCacheBackend } from '@branchline/cache'
import { createRedisClient } from '@branchline/redis'
import { getConfig } from '../../config/env.js'
import type { BranchlineConfig } from '../../config/env.js'
import { classifyError } from '../../errors.js'
import { saveDatasetToCsv, scrapeCsv } from '../../export/csv.js'
import type { StageRegistry } from '../../registry.js'
import { scrape, take } from '../../scrape.js'
import type { Context, ScrapeOptions, StageOptions, Transport } from '../../types.js'
import { isValidUrl } from '../../utils/url.js'
import { loadPipeline } from '../pipeline.js'

export const CACHE_MODES = ['fs', 'memory', 'redis', 'none'] as const
export type CacheMode = (typeof CACHE_MODES)[number]

function isCacheMode(value: string): value is CacheMode {
  return CACHE_MODES.some(mode => mode === value)
}

export interface RunCommandArgs {
  pipeline: string
  seed: string
  url: string
  processor: string
  output: string
  limit?: number
  update: boolean
  cache: string
  cacheDir: string
  quiet: boolean
}

export interface RunCommandDeps {
  transport?: Transport
  logger?: ILogger
  env?: NodeJS.ProcessEnv
  /** Receives one JSON line per record when no output file is given */
  write?: (line: string) => void
}

interface CacheSetup {
  options: Pick<StageOptions, 'htmlCache' | 'processedCache'>
  close: () => Promise<void>
}

function setupCache(mode: CacheMode, env: NodeJS.ProcessEnv): CacheSetup {
  const noop = async (): Promise<void> => {}

  switch (mode) {
    case 'fs':
      return { options: { htmlCache: true, processedCache: true }, close: noop }
    case 'memory':
      return {
        options: { htmlCache: new MemoryCacheBackend(), processedCache: new MemoryCacheBackend() },
        close: noop,
      }
    case 'redis': {
      const client = createRedisClient(env)
      const backend = new RedisCacheBackend(client)
      return {
        options: { htmlCache: backend, processedCache: backend },
        close: async () => {
          await client.quit()
        },
      }
    }
    case 'none':
      return { options: { htmlCache: false, processedCache: false }, close: noop }
  }
}

export async function runRunCommand(args: RunCommandArgs, deps: RunCommandDeps = {}): Promise<number> {
  if (!args.pipeline) {
    console.error('Missing --pipeline <module>')
    return 2
  }
  const fromUrl = Boolean(args.url || args.processor)
  if (args.seed && fromUrl) {
    console.error('Use either --seed or --url with --processor, not both')
    return 2
  }
  if (!args.seed && !(args.url && args.processor)) {
    console.error('Missing --seed <id> (or --url <url> --processor <id>)')
    return 2
  }
  if (args.url && !isValidUrl(args.url)) {
    console.error(`Invalid URL: ${args.url}`)
    return 2
  }
  const cacheMode = args.cache || 'fs'
  if (!isCacheMode(cacheMode)) {
    console.error(`--cache must be one of ${CACHE_MODES.join(', ')}`)
    return 2
  }
  if (args.limit !== undefined && args.limit < 1) {
    console.error('--limit must be a positive integer')
    return 2
  }

  if (args.quiet) {
    setLogLevel('warn')
  }

  const env = deps.env ?? process.env
  const logger = (deps.logger ?? createLogger('branchline')).child('cli')
  const write = deps.write ?? ((line: string) => process.stdout.write(`${line}\n`))

  let config: BranchlineConfig
  try {
    config = getConfig(env)
  } catch (error) {
    console.error(classifyError(error).message)
    return 2
  }

  let registry: StageRegistry
  try {
    registry = await loadPipeline(args.pipeline)
  } catch (error) {
    console.error(`Failed to load pipeline: ${classifyError(error).message}`)
    return 2
  }

  const cache = setupCache(cacheMode, env)
  const options: ScrapeOptions = {
    registry,
    transport: deps.transport,
    logger,
    cacheDir: args.cacheDir || config.cacheDir,
    retries: config.retries,
    httpOptions: { timeoutMs: config.httpTimeoutMs },
    update: args.update,
    ...cache.options,
  }
  const seed: Context[] | string = args.seed || [{ url: args.url, processor: args.processor }]

  try {
    if (args.output) {
      const written =
        args.limit === undefined
          ? await scrapeCsv(seed, args.output, options)
          : await saveDatasetToCsv(take(scrape(seed, options), args.limit), args.output)
      logger.info('Wrote records', { count: written, output: args.output })
      return 0
    }

    const records = scrape(seed, options)
    for await (const record of args.limit === undefined ? records : take(records, args.limit)) {
      write(JSON.stringify(record))
    }
    return 0
  } catch (error) {
    const classified = classifyError(error)
    logger.error('Scrape failed', { code: classified.code, kind: classified.kind }, error)
    return 1
  } finally {
    await cache.close()
  }
}
