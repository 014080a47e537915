/**
 * Environment configuration.
 *
 * loadEnv() reads .env from the working directory outside production;
 * production runs get their variables from the platform.
 *
 * Variables:
 * - BRANCHLINE_DATA_DIR: root for cached pages and results. Default: ~/branchline-data
 * - BRANCHLINE_HTTP_TIMEOUT_MS: per-attempt timeout. Default: 5000
 * - BRANCHLINE_RETRIES: transport attempts per page. Default: 5
 */

import { config as loadDotenv } from 'dotenv'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import { z } from 'zod'
import { ScrapeError, SCRAPE_ERROR_CODES } from '../errors.js'

const EnvSchema = z.object({
  BRANCHLINE_DATA_DIR: z.string().min(1).optional(),
  BRANCHLINE_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  BRANCHLINE_RETRIES: z.coerce.number().int().positive().optional(),
})

export interface BranchlineConfig {
  /** All output, temporary or final, goes under here */
  dataDir: string
  /** Holds html/ (downloaded pages) and processed/ (stage results) */
  cacheDir: string
  httpTimeoutMs: number
  retries: number
}

export function loadEnv(): void {
  if (process.env.NODE_ENV !== 'production') {
    loadDotenv()
  }
}

/**
 * Parse configuration from the environment.
 * @throws ScrapeError (CONFIGURATION_ERROR) listing invalid variables
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): BranchlineConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ScrapeError('fatal', SCRAPE_ERROR_CODES.CONFIGURATION_ERROR, `Invalid environment: ${details}`)
  }

  const dataDir = resolve(parsed.data.BRANCHLINE_DATA_DIR ?? join(homedir(), 'branchline-data'))

  return {
    dataDir,
    cacheDir: join(dataDir, 'cache'),
    httpTimeoutMs: parsed.data.BRANCHLINE_HTTP_TIMEOUT_MS ?? 5000,
    retries: parsed.data.BRANCHLINE_RETRIES ?? 5,
  }
}
