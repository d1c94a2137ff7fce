export interface RateLimiterOptions {
  now?: () => number
  // Upper bound on tracked clients; the least recently seen are dropped first.
  maxTrackedClients?: number
}

/**
 * Sliding-window request counter per client fingerprint. The limit and the
 * window come from the request's settings, so they may differ per call.
 */
export class SlidingWindowRateLimiter {
  private readonly now: () => number
  private readonly maxTrackedClients: number
  private readonly hits = new Map<string, number[]>()

  constructor(options: RateLimiterOptions = {}) {
    this.now = options.now ?? Date.now
    this.maxTrackedClients = Math.max(1, options.maxTrackedClients ?? 100_000)
  }

  /**
   * Records a request and reports whether the client has gone over `limit`
   * requests within the last `windowSeconds`.
   */
  hit(key: string, limit: number, windowSeconds: number): boolean {
    const now = this.now()
    const windowStart = now - windowSeconds * 1000
    const recent = (this.hits.get(key) ?? []).filter((timestamp) => timestamp > windowStart)
    recent.push(now)

    // Re-insert so Map order tracks recency.
    this.hits.delete(key)
    this.hits.set(key, recent)
    this.evictOverflow()

    return recent.length > limit
  }

  private evictOverflow(): void {
    while (this.hits.size > this.maxTrackedClients) {
      const oldest = this.hits.keys().next()
      if (oldest.done) {
        return
      }
      this.hits.delete(oldest.value)
    }
  }
}
