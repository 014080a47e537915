/**
 * @branchline/logger
 *
 * Console logging for the scrape engine and CLI. Every record carries the
 * service name and a component path built from child loggers, e.g.
 * `branchline [driver:processor:fetch]`.
 *
 * LOG_LEVEL picks the minimum level (default info). LOG_FORMAT is json or
 * pretty; without it, production writes JSON lines.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFormat = 'json' | 'pretty'

export type LogContext = Record<string, unknown>

interface LogRecord extends LogContext {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: { name: string; message: string; stack?: string }
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

const COLOR: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: line => console.debug(line),
  info: line => console.info(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
}

let levelOverride: LogLevel | null = null
let formatOverride: LogFormat | null = null

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(SEVERITY, value)
}

/**
 * Override LOG_LEVEL for the whole process (the CLI's --quiet). null
 * restores the environment's level.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

export function setLogFormat(format: LogFormat | null): void {
  formatOverride = format
}

function currentLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase()
  return levelOverride ?? (isLogLevel(fromEnv) ? fromEnv : 'info')
}

function currentFormat(): LogFormat {
  if (formatOverride) return formatOverride
  const fromEnv = process.env.LOG_FORMAT?.toLowerCase()
  if (fromEnv === 'json' || fromEnv === 'pretty') return fromEnv
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function describeError(error: unknown): LogRecord['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  return { name: 'UnknownError', message: String(error) }
}

function pretty(record: LogRecord): string {
  const { timestamp, level, service, component, message, error, ...meta } = record
  const source = component ? `${service}:${component}` : service
  const extra = Object.keys(meta).length > 0 ? ` \x1b[2m${JSON.stringify(meta)}\x1b[0m` : ''
  const trace = error ? `\n  \x1b[2m${error.stack ?? error.message}\x1b[0m` : ''

  return `\x1b[2m${timestamp}\x1b[0m ${COLOR[level]}${level.toUpperCase().padEnd(5)}\x1b[0m [${source}] ${message}${extra}${trace}`
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  /** Nested component; context merges over the parent's */
  child(component: string, context?: LogContext): ILogger
}

class ConsoleLogger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component: string | undefined,
    private readonly context: LogContext
  ) {}

  private write(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (SEVERITY[level] < SEVERITY[currentLevel()]) return

    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.context,
      ...meta,
    }
    if (this.component) record.component = this.component
    if (error !== undefined) record.error = describeError(error)

    WRITERS[level](currentFormat() === 'json' ? JSON.stringify(record) : pretty(record))
  }

  debug(message: string, meta?: LogContext): void {
    this.write('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.write('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.write('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.write('error', message, meta, error)
  }

  child(component: string, context: LogContext = {}): ILogger {
    const path = this.component ? `${this.component}:${component}` : component
    return new ConsoleLogger(this.service, path, { ...this.context, ...context })
  }
}

/**
 * ```ts
 * const log = createLogger('branchline').child('fetch', { stage: 'listing' })
 * log.warn('Transient failure while downloading, retrying', { url, attempt: 2 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new ConsoleLogger(service, undefined, {})
}
