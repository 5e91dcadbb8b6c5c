/**
 * Per-session request limiter. The counter resets once `windowMs` has elapsed since the
 * window opened.
 */

export class FixedWindowRateLimiter {
  private count = 0
  private windowStart: number

  constructor(
    readonly maxRequests: number,
    readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {
    this.windowStart = now()
  }

  /** Counts the request and returns true if it fits in the current window. */
  tryAcquire(): boolean {
    const t = this.now()
    if (t - this.windowStart > this.windowMs) {
      this.count = 0
      this.windowStart = t
    }
    if (this.count >= this.maxRequests) return false
    this.count++
    return true
  }

  /** Milliseconds until the current window resets. */
  retryAfterMs(): number {
    return Math.max(0, this.windowStart + this.windowMs - this.now())
  }
}
