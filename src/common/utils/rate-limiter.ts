import { Sleep, sleep } from './retry';

export interface RateLimitConfig {
  maxCalls: number;
  windowMs: number;
}

export interface RateLimiterOptions {
  now?: () => number;
  sleep?: Sleep;
  onThrottle?: (waitMs: number) => void;
}

/**
 * Sliding-window limiter: remembers when each call was let through and makes
 * the caller wait until the oldest call in the window ages out.
 */
export class RateLimiter {
  private readonly calls: number[] = [];
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private readonly onThrottle?: (waitMs: number) => void;

  constructor(
    private readonly config: RateLimitConfig,
    options: RateLimiterOptions = {},
  ) {
    if (config.maxCalls < 1 || config.windowMs <= 0) {
      throw new RangeError('Rate limit needs maxCalls >= 1 and a positive window');
    }
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.onThrottle = options.onThrottle;
  }

  async acquire(): Promise<void> {
    for (;;) {
      const now = this.now();
      this.evict(now);

      if (this.calls.length < this.config.maxCalls) {
        this.calls.push(now);
        return;
      }

      const waitMs = this.calls[0] + this.config.windowMs - now;
      this.onThrottle?.(waitMs);
      await this.sleep(waitMs);
    }
  }

  /** Calls still counted against the window. */
  inFlight(): number {
    this.evict(this.now());
    return this.calls.length;
  }

  private evict(now: number): void {
    while (this.calls.length > 0 && now - this.calls[0] >= this.config.windowMs) {
      this.calls.shift();
    }
  }
}
