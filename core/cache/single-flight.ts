/**
 * Single-flight cache
 *
 * A miss starts exactly one load per key; concurrent callers for the same
 * key await that load. Settled values live in an LRU. Failed loads are not
 * cached, so the next caller retries.
 *
 * @module core/cache/single-flight
 */

import { LRUCache, type CacheOptions, type CacheStats } from './lru.js'

export class SingleFlightCache<K, V> {
  private readonly settled: LRUCache<K, V>
  private readonly inFlight = new Map<K, Promise<V>>()
  private loads = 0

  constructor(options?: CacheOptions<K, V>) {
    this.settled = new LRUCache<K, V>(options)
  }

  /**
   * Cached value, the pending load, or a new load via `loader`
   */
  get(key: K, loader: (key: K) => Promise<V>): Promise<V> {
    const cached = this.settled.get(key)
    if (cached !== undefined) {
      return Promise.resolve(cached)
    }

    const pending = this.inFlight.get(key)
    if (pending) {
      return pending
    }

    this.loads++
    const promise = loader(key)
      .then((value) => {
        this.settled.set(key, value)
        return value
      })
      .finally(() => {
        this.inFlight.delete(key)
      })
    this.inFlight.set(key, promise)
    return promise
  }

  peek(key: K): V | undefined {
    return this.settled.peek(key)
  }

  set(key: K, value: V): void {
    this.settled.set(key, value)
  }

  delete(key: K): boolean {
    return this.settled.delete(key)
  }

  clear(): void {
    this.settled.clear()
  }

  /** Number of loader invocations so far */
  get loadCount(): number {
    return this.loads
  }

  get pendingCount(): number {
    return this.inFlight.size
  }

  getStats(): CacheStats {
    return this.settled.getStats()
  }
}
