export type LimiterClass = 'auth' | 'mutation' | 'read';

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Start of the next window. */
  resetAt: Date;
  retryAfterSeconds: number;
}

export interface RateLimiter {
  check(clientId: string, limiterClass: LimiterClass, limit: number): RateLimitDecision;
}

export interface FixedWindowRateLimiterOptions {
  windowMs?: number;
  /** Windows that started longer ago than this are dropped by a sweep. */
  retentionMs?: number;
  /** A sweep runs once the counter map holds more entries than this. */
  sweepThreshold?: number;
  now?: () => number;
  /** Called after each sweep with the number of windows dropped. */
  onSweep?: (removed: number) => void;
  onSweepError?: (err: unknown) => void;
}

interface WindowCounter {
  windowStart: number;
  count: number;
}

/**
 * Fixed-window request counter keyed by client, limiter class and window
 * start. State is process-local and starts empty after a restart.
 *
 * `check` increments and compares in one synchronous step, so concurrent
 * requests on the event loop cannot both take the last slot.
 */
export class FixedWindowRateLimiter implements RateLimiter {
  private readonly counters = new Map<string, WindowCounter>();
  private readonly windowMs: number;
  private readonly retentionMs: number;
  private readonly sweepThreshold: number;
  private readonly now: () => number;
  private readonly onSweep: (removed: number) => void;
  private readonly onSweepError: (err: unknown) => void;
  private lastSweepWindow = -1;

  constructor(opts: FixedWindowRateLimiterOptions = {}) {
    this.windowMs = opts.windowMs ?? 60_000;
    this.retentionMs = opts.retentionMs ?? 5 * 60_000;
    this.sweepThreshold = opts.sweepThreshold ?? 10_000;
    this.now = opts.now ?? Date.now;
    this.onSweep = opts.onSweep ?? (() => undefined);
    this.onSweepError = opts.onSweepError ?? (() => undefined);
  }

  get size(): number {
    return this.counters.size;
  }

  check(clientId: string, limiterClass: LimiterClass, limit: number): RateLimitDecision {
    const now = this.now();
    const windowStart = now - (now % this.windowMs);
    const key = `${clientId}:${limiterClass}:${windowStart}`;

    let counter = this.counters.get(key);
    if (!counter) {
      counter = { windowStart, count: 0 };
      this.counters.set(key, counter);
      // At most one sweep per window, however many new keys arrive in it.
      if (this.counters.size > this.sweepThreshold && windowStart !== this.lastSweepWindow) {
        this.lastSweepWindow = windowStart;
        this.sweep(now);
      }
    }

    const resetAtMs = windowStart + this.windowMs;
    const retryAfterSeconds = Math.max(1, Math.ceil((resetAtMs - now) / 1000));

    if (counter.count >= limit) {
      return {
        allowed: false,
        limit,
        remaining: 0,
        resetAt: new Date(resetAtMs),
        retryAfterSeconds,
      };
    }

    counter.count++;
    return {
      allowed: true,
      limit,
      remaining: limit - counter.count,
      resetAt: new Date(resetAtMs),
      retryAfterSeconds,
    };
  }

  private sweep(now: number): void {
    try {
      const horizon = now - this.retentionMs;
      let removed = 0;
      for (const [key, counter] of this.counters) {
        if (counter.windowStart < horizon) {
          this.counters.delete(key);
          removed++;
        }
      }
      this.onSweep(removed);
    } catch (err) {
      this.onSweepError(err);
    }
  }
}
