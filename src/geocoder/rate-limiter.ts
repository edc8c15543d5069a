/**
 * Rate Limiter
 *
 * Minimum-interval gate between consecutive provider calls. The interval is
 * measured from the completion of the previous call, on a monotonic clock.
 * Serves a single sequential caller; concurrent callers are not coordinated.
 */

export const DEFAULT_MIN_INTERVAL_MS = 100

export interface RateLimiterOptions {
  /** Minimum delay between one call finishing and the next starting (default 100) */
  readonly minIntervalMs?: number | undefined
  /** Monotonic clock in milliseconds (default performance.now) */
  readonly now?: (() => number) | undefined
  /** Sleep implementation (default setTimeout) */
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class RateLimiter {
  readonly minIntervalMs: number
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private lastCompletedAt: number | null = null

  constructor(options: RateLimiterOptions = {}) {
    const minIntervalMs = options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS
    if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
      throw new RangeError(`minIntervalMs must be a non-negative number, got ${minIntervalMs}`)
    }
    this.minIntervalMs = minIntervalMs
    this.now = options.now ?? (() => performance.now())
    this.sleep = options.sleep ?? defaultSleep
  }

  /**
   * Wait until the minimum interval since the last completed call has passed.
   * The first call never waits.
   */
  async throttle(): Promise<void> {
    if (this.lastCompletedAt === null) return

    const elapsed = this.now() - this.lastCompletedAt
    const remaining = this.minIntervalMs - elapsed
    if (remaining > 0) {
      await this.sleep(remaining)
    }
  }

  /**
   * Record that a call has just finished.
   */
  markCompleted(): void {
    this.lastCompletedAt = this.now()
  }

  /**
   * Throttle, run the call, and record its completion whether it succeeded or threw.
   */
  async run<T>(call: () => Promise<T>): Promise<T> {
    await this.throttle()
    try {
      return await call()
    } finally {
      this.markCompleted()
    }
  }

  /** Forget the last call so the next one starts immediately. */
  reset(): void {
    this.lastCompletedAt = null
  }
}
