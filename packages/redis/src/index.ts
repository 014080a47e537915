/**
 * @branchline/redis - Redis connection settings for the shared cache
 *
 * The Redis cache backend in @branchline/cache takes any client with
 * get/set/del; this package builds that client from the environment so
 * the CLI and library users configure it the same way.
 */

import { Redis, type RedisOptions } from 'ioredis'
import { createLogger } from '@branchline/logger'

const log = createLogger('branchline').child('redis')

export interface RedisConfig {
  host: string
  port: number
  password: string | undefined
  redisUrl: string | undefined
}

/**
 * Parse Redis configuration from environment variables.
 *
 * REDIS_URL (redis://:password@host:port) wins over REDIS_HOST,
 * REDIS_PORT and REDIS_PASSWORD. The URL is always split into
 * components so the options never fall back to ioredis defaults.
 */
export function parseRedisConfig(env: NodeJS.ProcessEnv = process.env): RedisConfig {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    try {
      const url = new URL(redisUrl)
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password || undefined,
        redisUrl,
      }
    } catch {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT')
    }
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
    redisUrl: undefined,
  }
}

/**
 * Connection info for logging, password masked.
 */
export function describeRedisConfig(config: RedisConfig): string {
  return config.redisUrl
    ? config.redisUrl.replace(/\/\/([^:@/]*):[^@]+@/, '//$1:***@')
    : `${config.host}:${config.port}`
}

/**
 * Connection options for a cache client: bounded per-command retries
 * (a scrape should fail rather than hang) and capped reconnect backoff.
 */
export function buildRedisOptions(config: RedisConfig): RedisOptions {
  const info = describeRedisConfig(config)

  return {
    host: config.host,
    port: config.port,
    password: config.password,
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
    commandTimeout: 30000,
    lazyConnect: true,
    retryStrategy(times: number) {
      if (times > 10) {
        log.error('Giving up reconnecting', { attempts: times, connection: info })
        return null
      }
      const delay = Math.min(times * 500, 5000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },
  }
}

/**
 * Create a client from the environment. The caller owns it and closes
 * it with quit().
 */
export function createRedisClient(env: NodeJS.ProcessEnv = process.env): Redis {
  const config = parseRedisConfig(env)
  const client = new Redis(buildRedisOptions(config))

  client.on('error', (err: Error) => {
    log.error('Connection error', { connection: describeRedisConfig(config) }, err)
  })

  return client
}

export { Redis }
export type { RedisOptions }
