/**
 * Pipeline modules.
 *
 * A pipeline module default-exports either a StageRegistry or a function
 * that registers stages and seeds on the registry it is given.
 */

import { resolve } from 'node:path'
import { pathToFileURL } from 'node:url'
import { ScrapeError, SCRAPE_ERROR_CODES } from '../errors.js'
import { StageRegistry } from '../registry.js'

export type PipelineSetup = (registry: StageRegistry) => void | Promise<void>

function isPipelineSetup(value: unknown): value is PipelineSetup {
  return typeof value === 'function'
}

function defaultExport(loaded: unknown): unknown {
  if (typeof loaded === 'object' && loaded !== null && 'default' in loaded) {
    return loaded.default
  }
  return undefined
}

export async function loadPipeline(modulePath: string): Promise<StageRegistry> {
  const loaded: unknown = await import(pathToFileURL(resolve(modulePath)).href)
  const candidate = defaultExport(loaded)

  if (candidate instanceof StageRegistry) {
    return candidate
  }

  if (isPipelineSetup(candidate)) {
    const registry = new StageRegistry()
    await candidate(registry)
    return registry
  }

  throw new ScrapeError(
    'fatal',
    SCRAPE_ERROR_CODES.CONFIGURATION_ERROR,
    `Pipeline module ${modulePath} must default-export a StageRegistry or a setup function`
  )
}
