interface CacheEntry<V> {
  value: V
  storedAt: number
}

export interface TtlCacheOptions {
  ttlMs: number
  now?: () => number
}

/**
 * Process-wide cache keyed by (namespace, input). Entries older than the TTL
 * are never returned and are dropped on the lookup that finds them expired.
 */
export class TtlCache<V> {
  private readonly ttlMs: number
  private readonly now: () => number
  private readonly entries = new Map<string, CacheEntry<V>>()
  private readonly inFlight = new Map<string, Promise<V | undefined>>()

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs
    this.now = options.now ?? Date.now
  }

  static key(namespace: string, input: string): string {
    return `${namespace}\u0000${input}`
  }

  get(namespace: string, input: string): V | undefined {
    const key = TtlCache.key(namespace, input)
    const entry = this.entries.get(key)
    if (!entry) {
      return undefined
    }

    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key)
      return undefined
    }

    return entry.value
  }

  set(namespace: string, input: string, value: V): void {
    this.entries.set(TtlCache.key(namespace, input), { value, storedAt: this.now() })
  }

  /**
   * Returns the cached value or runs `load`. Concurrent callers for the same
   * key share a single `load`. A load resolving to undefined is not stored.
   */
  async getOrLoad(namespace: string, input: string, load: () => Promise<V | undefined>): Promise<V | undefined> {
    const cached = this.get(namespace, input)
    if (cached !== undefined) {
      return cached
    }

    const key = TtlCache.key(namespace, input)
    const pending = this.inFlight.get(key)
    if (pending) {
      return pending
    }

    const task = Promise.resolve()
      .then(load)
      .then((value) => {
        if (value !== undefined) {
          this.set(namespace, input, value)
        }
        return value
      })
      .finally(() => {
        this.inFlight.delete(key)
      })

    this.inFlight.set(key, task)
    return task
  }
}
