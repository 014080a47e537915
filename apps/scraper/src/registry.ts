/**
 * Stage Registry
 *
 * Stages and seeds are registered explicitly under a scope and looked up
 * by `scope/name`. A bare name resolves against the caller's default
 * scope. The registry is built before a run and only read during it.
 */

import { ScrapeError, SCRAPE_ERROR_CODES, UnknownStageError } from './errors.js'
import type { Context, SeedProducer, Stage } from './types.js'

export const DEFAULT_SCOPE = 'default'

export interface QualifiedName {
  scope: string
  name: string
  id: string
}

/**
 * Split an identifier at its last '/'. Without one, the name lives in
 * defaultScope.
 */
export function qualify(identifier: string, defaultScope: string = DEFAULT_SCOPE): QualifiedName {
  const separator = identifier.lastIndexOf('/')
  const scope = separator > 0 ? identifier.slice(0, separator) : defaultScope
  const name = separator > 0 ? identifier.slice(separator + 1) : identifier
  return { scope, name, id: `${scope}/${name}` }
}

export interface ResolvedSeed {
  producer: SeedProducer
  scope: string
}

export interface StageRegistryOptions {
  defaultScope?: string
}

export class StageRegistry {
  readonly defaultScope: string

  private readonly stages = new Map<string, Stage>()
  private readonly seeds = new Map<string, SeedProducer>()

  constructor(options: StageRegistryOptions = {}) {
    this.defaultScope = options.defaultScope ?? DEFAULT_SCOPE
  }

  /**
   * Register a stage under its own name.
   * @throws ScrapeError if the name is invalid or already taken in scope
   */
  register(stage: Stage, scope: string = this.defaultScope): this {
    const { id } = this.checkName(stage.name, scope)
    if (this.stages.has(id)) {
      throw new ScrapeError('fatal', SCRAPE_ERROR_CODES.CONFIGURATION_ERROR, `Stage '${id}' is already registered`)
    }
    this.stages.set(id, stage)
    return this
  }

  /**
   * Register a named producer of root contexts.
   * @throws ScrapeError if the name is invalid or already taken in scope
   */
  registerSeed(name: string, producer: SeedProducer, scope: string = this.defaultScope): this {
    const { id } = this.checkName(name, scope)
    if (this.seeds.has(id)) {
      throw new ScrapeError('fatal', SCRAPE_ERROR_CODES.CONFIGURATION_ERROR, `Seed '${id}' is already registered`)
    }
    this.seeds.set(id, producer)
    return this
  }

  /**
   * @throws UnknownStageError when nothing is registered under identifier
   */
  resolve(identifier: string, defaultScope: string = this.defaultScope): Stage {
    const stage = this.stages.get(qualify(identifier, defaultScope).id)
    if (!stage) {
      throw new UnknownStageError(identifier)
    }
    return stage
  }

  /**
   * Look up a seed and the scope its stages resolve in.
   * @throws UnknownStageError when no seed is registered under identifier
   */
  resolveSeed(identifier: string, defaultScope: string = this.defaultScope): ResolvedSeed {
    const { id, scope } = qualify(identifier, defaultScope)
    const producer = this.seeds.get(id)
    if (!producer) {
      throw new UnknownStageError(identifier)
    }
    return { producer, scope }
  }

  has(identifier: string, defaultScope: string = this.defaultScope): boolean {
    return this.stages.has(qualify(identifier, defaultScope).id)
  }

  /** Registered stage ids, sorted */
  list(): string[] {
    return Array.from(this.stages.keys()).sort()
  }

  /** Registered seed ids, sorted */
  listSeeds(): string[] {
    return Array.from(this.seeds.keys()).sort()
  }

  /**
   * Check that every stage the contexts name is registered.
   * @throws UnknownStageError for the first unknown identifier
   */
  validate(contexts: Iterable<Context>, defaultScope: string = this.defaultScope): void {
    for (const context of contexts) {
      if (context.processor !== undefined) {
        this.resolve(context.processor, defaultScope)
      }
    }
  }

  private checkName(name: string, scope: string): QualifiedName {
    if (!name || name.includes('/')) {
      throw new ScrapeError(
        'fatal',
        SCRAPE_ERROR_CODES.CONFIGURATION_ERROR,
        `Invalid name '${name}': must be non-empty and contain no '/'`
      )
    }
    if (!scope) {
      throw new ScrapeError('fatal', SCRAPE_ERROR_CODES.CONFIGURATION_ERROR, 'Scope must not be empty')
    }
    return qualify(`${scope}/${name}`)
  }
}
