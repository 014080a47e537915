/**
 * Cache backend contract shared by the HTML cache (raw page bodies) and
 * the processed cache (stage results).
 *
 * Every operation is total: a miss resolves to undefined, never rejects.
 * Storage faults (disk full, lost connection) still reject; those are
 * the backend's concern, not a miss.
 */
export interface CacheBackend {
  /** Raw page body stored under key, if any */
  loadRaw(key: string): Promise<string | undefined>

  saveRaw(key: string, body: string): Promise<void>

  /** JSON-compatible value stored under key, if any */
  load(key: string): Promise<unknown>

  save(key: string, value: unknown): Promise<void>
}

export function isCacheBackend(value: unknown): value is CacheBackend {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  return (
    'loadRaw' in value &&
    typeof value.loadRaw === 'function' &&
    'saveRaw' in value &&
    typeof value.saveRaw === 'function' &&
    'load' in value &&
    typeof value.load === 'function' &&
    'save' in value &&
    typeof value.save === 'function'
  )
}
