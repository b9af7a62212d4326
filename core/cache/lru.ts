/**
 * Bounded LRU cache for manifests and descriptors
 *
 * Relies on Map insertion order: a hit re-inserts the entry so the first
 * key is always the least recently used one.
 *
 * @module core/cache/lru
 */

export interface CacheOptions<K = string, V = unknown> {
  /**
   * Maximum number of entries in the cache.
   * @default 500
   */
  maxSize?: number

  /**
   * Called when an entry is evicted or deleted.
   */
  onEvict?: (key: K, value: V) => void
}

export interface CacheStats {
  hits: number
  misses: number
  evictions: number
  /** Current number of entries */
  count: number
  /** Hit rate as percentage (0-100) */
  hitRate: number
}

/**
 * @example
 * ```typescript
 * const cache = new LRUCache<string, PackageDescriptor>({ maxSize: 200 })
 * cache.set('luasocket@3.1.0-1', descriptor)
 * cache.get('luasocket@3.1.0-1')
 * ```
 */
export class LRUCache<K = string, V = unknown> {
  private entries = new Map<K, { value: V }>()
  private maxSize: number
  private onEvict: ((key: K, value: V) => void) | undefined
  private hits = 0
  private misses = 0
  private evictions = 0

  constructor(options?: CacheOptions<K, V>) {
    this.maxSize = options?.maxSize ?? 500
    this.onEvict = options?.onEvict
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * Look up a key and mark it most recently used
   */
  get(key: K): V | undefined {
    const entry = this.entries.get(key)
    if (!entry) {
      this.misses++
      return undefined
    }
    this.entries.delete(key)
    this.entries.set(key, entry)
    this.hits++
    return entry.value
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key)
    } else if (this.entries.size >= this.maxSize) {
      this.evictOldest()
    }
    this.entries.set(key, { value })
  }

  /**
   * Read without touching recency
   */
  peek(key: K): V | undefined {
    return this.entries.get(key)?.value
  }

  has(key: K): boolean {
    return this.entries.has(key)
  }

  delete(key: K): boolean {
    const entry = this.entries.get(key)
    if (!entry) {
      return false
    }
    this.entries.delete(key)
    this.onEvict?.(key, entry.value)
    return true
  }

  clear(): void {
    if (this.onEvict) {
      for (const [key, entry] of this.entries) {
        this.onEvict(key, entry.value)
      }
    }
    this.entries.clear()
  }

  /**
   * Keys from most to least recently used
   */
  keys(): K[] {
    return [...this.entries.keys()].reverse()
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      count: this.entries.size,
      hitRate: total === 0 ? 0 : Math.round((this.hits / total) * 100),
    }
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next()
    if (oldest.done) {
      return
    }
    const key = oldest.value
    const entry = this.entries.get(key)
    this.entries.delete(key)
    this.evictions++
    if (entry) {
      this.onEvict?.(key, entry.value)
    }
  }
}
