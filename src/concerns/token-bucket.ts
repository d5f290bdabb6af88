import { setTimeout as sleep } from 'node:timers/promises';
import type { Deadline } from './deadline.js';
import { tryFn } from './try-fn.js';

export interface RateLimit {
  maxCalls: number;
  perIntervalMs: number;
}

export interface TokenBucketOptions {
  now?: () => number;
}

/**
 * Token bucket holding `maxCalls` tokens, refilled continuously at
 * maxCalls / perIntervalMs. A limit with no calls or no interval disables it.
 */
export class TokenBucket {
  readonly capacity: number;
  readonly refillPerMs: number;
  private tokens: number;
  private lastRefill: number;
  private readonly now: () => number;

  constructor(limit: RateLimit, options: TokenBucketOptions = {}) {
    this.now = options.now ?? Date.now;
    this.capacity = Math.max(0, limit.maxCalls);
    this.refillPerMs = limit.perIntervalMs > 0 ? this.capacity / limit.perIntervalMs : 0;
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  enabled(): boolean {
    return this.capacity > 0 && this.refillPerMs > 0;
  }

  available(): number {
    this.refill();
    return this.enabled() ? this.tokens : Infinity;
  }

  tryTake(): boolean {
    if (!this.enabled()) return true;
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /** Milliseconds until a token becomes available; 0 when one already is. */
  waitTime(): number {
    if (!this.enabled()) return 0;
    this.refill();
    if (this.tokens >= 1) return 0;
    return Math.ceil((1 - this.tokens) / this.refillPerMs);
  }

  /**
   * Waits for a token. Resolves false, without taking one, when the wait
   * would outlast the deadline or the deadline fires first.
   */
  async acquire(deadline: Deadline): Promise<boolean> {
    while (!this.tryTake()) {
      const wait = this.waitTime();
      if (deadline.expired || wait > deadline.remaining()) {
        return false;
      }
      const [ok] = await tryFn(sleep(wait, undefined, { signal: deadline.signal }));
      if (!ok) return false;
    }
    return true;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerMs);
      this.lastRefill = now;
    }
  }
}
