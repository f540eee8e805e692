/**
 * Sliding-window rate limiter.
 *
 * Keeps the start time of every request admitted in the trailing window and
 * makes the caller wait until the oldest one leaves the window whenever the
 * ceiling is reached. A ceiling of 0 disables limiting.
 */

import { createLogger } from '../shared/logger';
import { RATE_LIMIT_WINDOW_MS } from '../shared/constants';

const logger = createLogger('RateLimiter');

export interface RateLimiterOptions {
  /** Requests allowed per window, 0 = unlimited */
  limit: number;
  windowMs?: number;
  /** Clock in ms; injectable for tests */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class RateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private timestamps: number[] = [];

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 0) {
      throw new RangeError(`Rate limit must be an integer >= 0 (got ${options.limit})`);
    }
    this.limit = options.limit;
    this.windowMs = options.windowMs ?? RATE_LIMIT_WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Wait until a request may start, record it, and return its timestamp.
   */
  async acquire(): Promise<number> {
    if (this.limit === 0) {
      return this.now();
    }

    for (;;) {
      const current = this.now();
      this.evict(current);

      if (this.timestamps.length < this.limit) {
        this.timestamps.push(current);
        return current;
      }

      const waitMs = this.timestamps[0] + this.windowMs - current;
      logger.warn(`Rate limit of ${this.limit}/${this.windowMs}ms reached, waiting ${waitMs}ms`);
      await this.sleep(waitMs);
    }
  }

  /**
   * How long acquire() would wait right now (0 if it would not)
   */
  getWaitTime(): number {
    if (this.limit === 0) return 0;
    const current = this.now();
    this.evict(current);
    if (this.timestamps.length < this.limit) return 0;
    return this.timestamps[0] + this.windowMs - current;
  }

  getWindowSize(): number {
    this.evict(this.now());
    return this.timestamps.length;
  }

  getLimit(): number {
    return this.limit;
  }

  reset(): void {
    this.timestamps = [];
  }

  private evict(current: number): void {
    while (this.timestamps.length > 0 && current - this.timestamps[0] >= this.windowMs) {
      this.timestamps.shift();
    }
  }
}
