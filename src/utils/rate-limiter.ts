interface RateLimiterConfig {
  maxRequests: number;
  windowMs: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  // Seconds until the oldest request in the window expires
  retryAfterSeconds: number;
}

/**
 * Sliding-window limiter keyed by Telegram user id.
 */
export class UserRateLimiter {
  private readonly hits = new Map<number, number[]>();
  private readonly config: RateLimiterConfig;

  constructor(config: RateLimiterConfig) {
    this.config = config;
  }

  check(userId: number, now: number = Date.now()): RateLimitDecision {
    const windowStart = now - this.config.windowMs;
    const recent = (this.hits.get(userId) ?? []).filter(ts => ts > windowStart);

    if (recent.length >= this.config.maxRequests) {
      this.hits.set(userId, recent);
      const oldest = recent[0] ?? now;
      const retryAfterSeconds = Math.max(1, Math.ceil((oldest + this.config.windowMs - now) / 1000));
      console.warn(`[RateLimit] User ${userId} exceeded ${this.config.maxRequests} requests`);
      return { allowed: false, retryAfterSeconds };
    }

    recent.push(now);
    this.hits.set(userId, recent);
    return { allowed: true, retryAfterSeconds: 0 };
  }

  /**
   * Drop users with no requests inside the window. Returns the number removed.
   */
  cleanup(now: number = Date.now()): number {
    const windowStart = now - this.config.windowMs;
    let removed = 0;
    for (const [userId, timestamps] of this.hits.entries()) {
      if (!timestamps.some(ts => ts > windowStart)) {
        this.hits.delete(userId);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.hits.size;
  }
}
