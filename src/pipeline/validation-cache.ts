/**
 * Memoisation for work done while validating a definition, before any repository is attached.
 *
 * Entries are keyed by the content they were computed from (e.g. the source of a code node), so an entry can never
 * go stale. The compiler creates one cache per {@link compilePipeline} call unless the caller passes its own;
 * a caller-owned cache lives until {@link ValidationCache.clear} is called. Nothing here is consulted at run time.
 */
export class ValidationCache {
  private readonly _entries = new Map<string, unknown>()
  private _hits = 0

  /**
   * Number of lookups answered from the cache.
   */
  get hits(): number {
    return this._hits
  }

  get size(): number {
    return this._entries.size
  }

  /**
   * Returns the cached value for `key`, computing and storing it on first use. A computation that throws is not
   * cached.
   *
   * @param namespace - Kind of entry, e.g. `code`
   * @param key - Content the value is derived from
   * @param compute - Produces the value
   * @param guard - Narrows a cached value back to `T`
   */
  getOrCompute<T>(namespace: string, key: string, compute: () => T, guard: (value: unknown) => value is T): T {
    const cacheKey = `${namespace}\u0000${key}`
    if (this._entries.has(cacheKey)) {
      const cached = this._entries.get(cacheKey)
      if (guard(cached)) {
        this._hits++
        return cached
      }
    }
    const value = compute()
    this._entries.set(cacheKey, value)
    return value
  }

  clear(): void {
    this._entries.clear()
    this._hits = 0
  }
}
