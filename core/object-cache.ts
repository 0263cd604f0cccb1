/**
 * ObjectCache - TTL cache keyed by canonical path
 *
 * Holds what the resolver has already paid round-trips for: fully fetched
 * objects keyed by their canonical path, or child references keyed by a
 * directory prefix. An entry is valid while `now - storedAt < ttlMs`; a lookup
 * past that point evicts the entry and reports a miss.
 *
 * There is no size bound and no eviction besides the TTL: the working set is a
 * single session's. Instances are not synchronized and belong to exactly one
 * DrivePath.
 *
 * @example
 * ```typescript
 * const cache = new ObjectCache<RemoteObject>({ ttlMs: 60_000 })
 * cache.put('docs/a.txt', file)
 * cache.get('docs/a.txt')   // file, until 60s have passed
 * cache.deleteTree('docs')  // drops 'docs' and everything below it
 * ```
 *
 * @module core/object-cache
 */

import { CACHE_TTL_MS } from './constants.js'
import { isSameOrDescendant } from './path.js'

interface CacheEntry<V> {
  value: V
  storedAt: number
}

export interface ObjectCacheOptions {
  /** Entry lifetime in milliseconds (default: 60 000) */
  ttlMs?: number
  /** Clock in milliseconds; defaults to Date.now */
  now?: () => number
}

export class ObjectCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>()
  private readonly ttlMs: number
  private readonly now: () => number

  constructor(options: ObjectCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? CACHE_TTL_MS
    this.now = options.now ?? (() => Date.now())
  }

  /**
   * Add or replace an entry, resetting its timestamp.
   */
  put(key: string, value: V): void {
    this.entries.set(key, { value, storedAt: this.now() })
  }

  /**
   * Look up an entry. Expired entries are evicted and reported as absent.
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key)
      return undefined
    }
    return entry.value
  }

  /**
   * Remove a single entry.
   */
  delete(key: string): boolean {
    return this.entries.delete(key)
  }

  /**
   * Remove an entry together with every entry whose key lies below it.
   *
   * @returns Number of entries removed
   */
  deleteTree(key: string): number {
    let removed = 0
    for (const existing of [...this.entries.keys()]) {
      if (isSameOrDescendant(existing, key)) {
        this.entries.delete(existing)
        removed++
      }
    }
    return removed
  }

  /**
   * Drop everything.
   */
  clear(): void {
    this.entries.clear()
  }

  /**
   * Number of stored entries, expired or not.
   */
  get size(): number {
    return this.entries.size
  }
}
