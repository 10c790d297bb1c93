/**
 * Rate Limiter
 *
 * Enforces a minimum interval between consecutive calls to one external service.
 * The pipeline is strictly sequential, so tracking the time of the last call is enough.
 */

/** Nominatim's usage policy allows one request per second; keep a margin. */
export const DEFAULT_MIN_INTERVAL_MS = 1100

/**
 * Time source, injectable so tests don't actually wait.
 */
export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms))
}

export class RateLimiter {
  private lastCallAt: number | null = null

  constructor(
    readonly minIntervalMs: number = DEFAULT_MIN_INTERVAL_MS,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Wait until at least `minIntervalMs` has passed since the previous call, then record this one.
   */
  async wait(): Promise<void> {
    if (this.lastCallAt !== null) {
      const elapsed = this.clock.now() - this.lastCallAt
      if (elapsed < this.minIntervalMs) {
        await this.clock.sleep(this.minIntervalMs - elapsed)
      }
    }
    this.lastCallAt = this.clock.now()
  }
}

/**
 * A limiter that never waits (tests, dry runs).
 */
export function createUnlimited(): RateLimiter {
  return new RateLimiter(0)
}
