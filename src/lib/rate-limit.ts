// In-memory sliding window rate limiter for the upload endpoint.
// Per-process state; it belongs to the serving layer, never to the engine.

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  limit: number;
  retryAfterMs: number;
}

export interface RateLimiterOptions {
  limit: number;
  windowMs: number;
  /** Injectable clock for tests. */
  now?: () => number;
}

// Stale keys are swept at most once per interval
const CLEANUP_INTERVAL = 60_000;

export class SlidingWindowRateLimiter {
  private readonly store = new Map<string, number[]>();
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private lastCleanup: number;

  constructor(options: RateLimiterOptions) {
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
    this.lastCleanup = this.now();
  }

  check(key: string): RateLimitResult {
    const now = this.now();
    this.cleanup(now);

    const cutoff = now - this.windowMs;
    const timestamps = (this.store.get(key) ?? []).filter((t) => t > cutoff);

    if (timestamps.length >= this.limit) {
      this.store.set(key, timestamps);
      return {
        allowed: false,
        remaining: 0,
        limit: this.limit,
        retryAfterMs: Math.max(0, timestamps[0] + this.windowMs - now),
      };
    }

    timestamps.push(now);
    this.store.set(key, timestamps);
    return {
      allowed: true,
      remaining: this.limit - timestamps.length,
      limit: this.limit,
      retryAfterMs: 0,
    };
  }

  private cleanup(now: number): void {
    if (now - this.lastCleanup < CLEANUP_INTERVAL) return;
    this.lastCleanup = now;

    const cutoff = now - this.windowMs;
    for (const [key, timestamps] of this.store) {
      const live = timestamps.filter((t) => t > cutoff);
      if (live.length === 0) this.store.delete(key);
      else this.store.set(key, live);
    }
  }
}
