import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname, isAbsolute, relative, resolve } from 'node:path'

import type { CacheBackend } from './types.js'

export interface FsCacheBackendOptions {
  /** Suffix for raw bodies. Default: .html */
  readonly rawExtension?: string
  /** Suffix for values. Default: .json */
  readonly valueExtension?: string
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}

/**
 * Filesystem cache keyed by path prefix: key `numbers/12` lives at
 * `<directory>/numbers/12.html` (raw) and `<directory>/numbers/12.json`
 * (value). Parent directories are created on write.
 */
export class FsCacheBackend implements CacheBackend {
  readonly directory: string
  private readonly rawExtension: string
  private readonly valueExtension: string

  constructor(directory: string, options: FsCacheBackendOptions = {}) {
    this.directory = resolve(directory)
    this.rawExtension = options.rawExtension ?? '.html'
    this.valueExtension = options.valueExtension ?? '.json'
  }

  /**
   * Absolute path for a key. Keys that would leave the cache directory
   * are rejected.
   */
  pathFor(key: string, extension: string): string {
    if (!key) {
      throw new Error('Cache key must not be empty')
    }
    const target = resolve(this.directory, `${key}${extension}`)
    const rel = relative(this.directory, target)
    if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
      throw new Error(`Cache key '${key}' resolves outside ${this.directory}`)
    }
    return target
  }

  async loadRaw(key: string): Promise<string | undefined> {
    return this.read(this.pathFor(key, this.rawExtension))
  }

  async saveRaw(key: string, body: string): Promise<void> {
    await this.write(this.pathFor(key, this.rawExtension), body)
  }

  async load(key: string): Promise<unknown> {
    const content = await this.read(this.pathFor(key, this.valueExtension))
    if (content === undefined) {
      return undefined
    }
    return JSON.parse(content)
  }

  async save(key: string, value: unknown): Promise<void> {
    await this.write(this.pathFor(key, this.valueExtension), JSON.stringify(value))
  }

  private async read(path: string): Promise<string | undefined> {
    try {
      return await readFile(path, 'utf8')
    } catch (error) {
      if (isNotFound(error)) {
        return undefined
      }
      throw error
    }
  }

  private async write(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, content, 'utf8')
  }
}
