import { env } from '../env';
import type { Clock, StateStore } from '../store/types';
import { systemClock } from '../store/types';

export interface RateLimitStatus {
  limited: boolean;
  count: number;
  limit: number;
  /** When the current window closes; null when no window is open. */
  resetAt: Date | null;
}

export interface RateLimiterOptions {
  store: StateStore;
  clock?: Clock;
  prefix?: string;
  windowMs?: number;
}

/**
 * Fixed-window call counter per caller identity. The window opens on the
 * first increment and is not extended by later ones.
 */
export class RateLimiter {
  private readonly store: StateStore;
  private readonly clock: Clock;
  private readonly prefix: string;
  private readonly windowMs: number;

  constructor(options: RateLimiterOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.prefix = options.prefix ?? env.RATE_LIMIT_PREFIX;
    this.windowMs = options.windowMs ?? env.RATE_LIMIT_WINDOW_SECONDS * 1000;
  }

  key(identityHash: string): string {
    return `${this.prefix}:${identityHash}`;
  }

  async check(identityHash: string, limit: number): Promise<RateLimitStatus> {
    const key = this.key(identityHash);
    const raw = await this.store.get(key);
    const parsed = raw === null ? 0 : Number.parseInt(raw, 10);
    const count = Number.isFinite(parsed) ? parsed : 0;

    let resetAt: Date | null = null;
    if (count > 0) {
      const ttl = await this.store.ttlMs(key);
      if (ttl !== null) {
        resetAt = new Date(this.clock() + ttl);
      }
    }

    return { limited: count >= limit, count, limit, resetAt };
  }

  async increment(identityHash: string): Promise<number> {
    return this.store.incrementWindow(this.key(identityHash), this.windowMs);
  }
}
