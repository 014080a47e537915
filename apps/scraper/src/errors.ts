/**
 * Scrape Error Classification
 *
 * Every failure the engine raises carries a kind decided once, where it
 * is detected:
 * - transient: recoverable transport fault, retried up to a bound
 * - definitive: well-formed error response, routed to the error handler
 * - fatal: aborts the run (retries exhausted, bad configuration, cancel)
 */

export type ScrapeErrorKind = 'transient' | 'definitive' | 'fatal'

export const SCRAPE_ERROR_CODES = {
  HTTP_ERROR: 'HTTP_ERROR',
  RETRIES_EXHAUSTED: 'RETRIES_EXHAUSTED',
  UNKNOWN_STAGE: 'UNKNOWN_STAGE',
  TEMPLATE_FIELD_MISSING: 'TEMPLATE_FIELD_MISSING',
  INVALID_STAGE_OUTPUT: 'INVALID_STAGE_OUTPUT',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  ABORTED: 'ABORTED',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ScrapeErrorCode = (typeof SCRAPE_ERROR_CODES)[keyof typeof SCRAPE_ERROR_CODES]

export class ScrapeError extends Error {
  readonly kind: ScrapeErrorKind
  readonly code: ScrapeErrorCode

  constructor(kind: ScrapeErrorKind, code: ScrapeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ScrapeError'
    this.kind = kind
    this.code = code
  }
}

/**
 * Raised by the default error handler for any definitive failure other
 * than 404.
 */
export class DefinitiveFetchError extends ScrapeError {
  readonly url: string
  readonly status: number

  constructor(url: string, status: number, statusText: string) {
    super(
      'definitive',
      SCRAPE_ERROR_CODES.HTTP_ERROR,
      `${statusText ? `HTTP ${status} ${statusText}` : `HTTP ${status}`}: ${url}`
    )
    this.name = 'DefinitiveFetchError'
    this.url = url
    this.status = status
  }
}

export class RetriesExhaustedError extends ScrapeError {
  readonly url: string
  readonly attempts: number

  constructor(url: string, attempts: number, lastError?: string) {
    super(
      'fatal',
      SCRAPE_ERROR_CODES.RETRIES_EXHAUSTED,
      `Maximum number of retries exceeded: ${url}`,
      lastError ? { cause: lastError } : undefined
    )
    this.name = 'RetriesExhaustedError'
    this.url = url
    this.attempts = attempts
  }
}

export class UnknownStageError extends ScrapeError {
  readonly identifier: string

  constructor(identifier: string) {
    super('fatal', SCRAPE_ERROR_CODES.UNKNOWN_STAGE, `Unable to resolve processor: ${identifier}`)
    this.name = 'UnknownStageError'
    this.identifier = identifier
  }
}

export class TemplateFieldError extends ScrapeError {
  readonly field: string
  readonly template: string

  constructor(field: string, template: string) {
    super(
      'fatal',
      SCRAPE_ERROR_CODES.TEMPLATE_FIELD_MISSING,
      `Template '${template}' references missing field '${field}'`
    )
    this.name = 'TemplateFieldError'
    this.field = field
    this.template = template
  }
}

export class InvalidStageOutputError extends ScrapeError {
  constructor(message: string) {
    super('fatal', SCRAPE_ERROR_CODES.INVALID_STAGE_OUTPUT, message)
    this.name = 'InvalidStageOutputError'
  }
}

export class ScrapeAbortedError extends ScrapeError {
  constructor(reason?: unknown) {
    super('fatal', SCRAPE_ERROR_CODES.ABORTED, 'Scrape aborted', reason === undefined ? undefined : { cause: reason })
    this.name = 'ScrapeAbortedError'
  }
}

export interface ClassifiedError {
  kind: ScrapeErrorKind
  code: ScrapeErrorCode
  message: string
  isRetryable: boolean
  originalError?: Error
}

/**
 * Classify anything thrown during a run for logging and exit codes.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ScrapeError) {
    return {
      kind: error.kind,
      code: error.code,
      message: error.message,
      isRetryable: error.kind === 'transient',
      originalError: error,
    }
  }

  if (error instanceof Error) {
    return {
      kind: 'fatal',
      code: SCRAPE_ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message,
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    kind: 'fatal',
    code: SCRAPE_ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isRetryable: false,
  }
}
