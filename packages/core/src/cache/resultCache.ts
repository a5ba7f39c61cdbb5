import type { Logger } from '../debug/logger.js'
import { silentLogger } from '../debug/logger.js'

/** Uniform lifetime of every cached result. */
export const CACHE_TTL_MS = 24 * 60 * 60 * 1000

export interface ResultCacheOptions {
  readonly ttlMs?: number | undefined
  readonly now?: (() => number) | undefined
  readonly logger?: Logger | undefined
}

export interface CacheEntry<T> {
  readonly key: string
  readonly value: T
  readonly insertedAt: number
  readonly ttlMs: number
}

export interface CacheLookup<T> {
  readonly value: T
  /** True when the value came from the cache or a fetch another caller started. */
  readonly cached: boolean
}

export interface CacheStats {
  readonly entries: number
  readonly hits: number
  readonly misses: number
  readonly ttlMs: number
}

/**
 * Time-bounded result cache.
 *
 * An entry is readable while `now - insertedAt < ttl`; expiry is checked when the
 * entry is read, and an expired entry is dropped at that point. Storing a new
 * entry also drops every other expired one. Failed fetches are never stored. Concurrent misses on one key share a single fetch.
 */
export class ResultCache<T> {
  readonly ttlMs: number
  private readonly now: () => number
  private readonly logger: Logger
  private readonly entries = new Map<string, CacheEntry<T>>()
  private readonly inFlight = new Map<string, Promise<T>>()
  private generation = 0
  private hits = 0
  private misses = 0

  constructor(options: ResultCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? CACHE_TTL_MS
    this.now = options.now ?? Date.now
    this.logger = options.logger ?? silentLogger
  }

  /** Entries held, including expired ones not read since they expired. */
  get size(): number {
    return this.entries.size
  }

  async getOrFetch(key: string, fetchFn: () => Promise<T>, ttlMs: number = this.ttlMs): Promise<T> {
    const result = await this.lookup(key, fetchFn, ttlMs)
    return result.value
  }

  async lookup(key: string, fetchFn: () => Promise<T>, ttlMs: number = this.ttlMs): Promise<CacheLookup<T>> {
    const entry = this.read(key, ttlMs)
    if (entry !== undefined) {
      this.hits++
      this.logger.debug({ key }, 'cache hit')
      return { value: entry.value, cached: true }
    }

    const pending = this.inFlight.get(key)
    if (pending !== undefined) {
      this.hits++
      this.logger.debug({ key }, 'cache join in-flight fetch')
      return { value: await pending, cached: true }
    }

    this.misses++
    this.logger.debug({ key }, 'cache miss')
    const promise = this.fetchAndStore(key, fetchFn, ttlMs, this.generation)
    this.inFlight.set(key, promise)
    try {
      return { value: await promise, cached: false }
    } finally {
      if (this.inFlight.get(key) === promise) this.inFlight.delete(key)
    }
  }

  has(key: string): boolean {
    return this.read(key, this.ttlMs) !== undefined
  }

  /** Remove every entry regardless of key or age. Returns the number removed. */
  clearAll(): number {
    const removed = this.entries.size
    this.entries.clear()
    this.inFlight.clear()
    this.generation++
    this.logger.debug({ removed }, 'cache cleared')
    return removed
  }

  stats(): CacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses, ttlMs: this.ttlMs }
  }

  private read(key: string, ttlMs: number): CacheEntry<T> | undefined {
    const entry = this.entries.get(key)
    if (entry === undefined) return undefined
    if (this.now() - entry.insertedAt < ttlMs) return entry
    this.entries.delete(key)
    return undefined
  }

  private async fetchAndStore(key: string, fetchFn: () => Promise<T>, ttlMs: number, generation: number): Promise<T> {
    const value = await fetchFn()
    // A clearAll() during the fetch invalidates its result
    if (generation === this.generation) {
      const now = this.now()
      this.sweep(now)
      this.entries.set(key, { key, value, insertedAt: now, ttlMs })
    }
    return value
  }

  private sweep(now: number): void {
    let dropped = 0
    for (const [key, entry] of this.entries) {
      if (now - entry.insertedAt >= entry.ttlMs) {
        this.entries.delete(key)
        dropped++
      }
    }
    if (dropped > 0) this.logger.debug({ dropped }, 'cache swept expired entries')
  }
}
