export interface CircuitBreakerState {
  state: 'closed' | 'open' | 'half_open';
  failureCount: number;
  lastOpenedAt: Date | null;
  lastSuccessAt: Date | null;
}

interface CircuitBreakerConfig {
  name?: string;
  threshold: number;
  cooldownMs: number;
}

/**
 * Trips after `threshold` consecutive failures and stays open for
 * `cooldownMs`, then lets a single probe through.
 */
export class CircuitBreaker {
  private state: 'closed' | 'open' | 'half_open' = 'closed';
  private failureCount = 0;
  private lastOpenedAt: Date | null = null;
  private lastSuccessAt: Date | null = null;
  private readonly config: CircuitBreakerConfig;
  private readonly tag: string;

  constructor(config: CircuitBreakerConfig) {
    this.config = config;
    this.tag = config.name ? `[CircuitBreaker:${config.name}]` : '[CircuitBreaker]';
  }

  isAllowed(): boolean {
    if (this.state === 'closed') {
      return true;
    }

    if (this.state === 'open') {
      const now = Date.now();
      const elapsed = this.lastOpenedAt
        ? now - this.lastOpenedAt.getTime()
        : Infinity;

      if (elapsed > this.config.cooldownMs) {
        this.state = 'half_open';
        this.failureCount = 0;
        console.log(`${this.tag} Transitioning to half_open`);
        return true;
      }

      return false;
    }

    // half_open - allow one request
    return true;
  }

  recordSuccess(): void {
    this.failureCount = 0;
    this.lastSuccessAt = new Date();

    if (this.state === 'half_open') {
      this.state = 'closed';
      console.log(`${this.tag} Recovered, transitioning to closed`);
    }
  }

  recordFailure(): void {
    if (this.state === 'half_open') {
      // Failed probe reopens immediately
      this.state = 'open';
      this.lastOpenedAt = new Date();
      console.log(`${this.tag} Probe failed, reopening`);
      return;
    }

    this.failureCount++;
    console.log(`${this.tag} Failure recorded (${this.failureCount}/${this.config.threshold})`);

    if (this.failureCount >= this.config.threshold) {
      this.state = 'open';
      this.lastOpenedAt = new Date();
      console.log(`${this.tag} Circuit opened, will retry after ${this.config.cooldownMs}ms`);
    }
  }

  getState(): CircuitBreakerState {
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastOpenedAt: this.lastOpenedAt,
      lastSuccessAt: this.lastSuccessAt,
    };
  }

  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.lastOpenedAt = null;
    console.log(`${this.tag} Reset to closed`);
  }
}
