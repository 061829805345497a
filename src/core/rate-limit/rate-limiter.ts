export type RateLimitStrategy = 'fixed-window' | 'sliding-window';

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  strategy?: RateLimitStrategy;
  /**
   * Millisecond clock, `Date.now` unless overridden
   */
  now?: () => number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /**
   * Epoch millis at which another request is guaranteed a slot
   */
  resetAt: number;
  /**
   * Wait before retrying; 0 when allowed
   */
  retryAfterMs: number;
}

interface FixedWindowEntry {
  windowId: number;
  count: number;
}

/**
 * Per-key request limiter
 *
 * fixed-window: requests are counted per `floor(now / windowMs)` bucket.
 * sliding-window: a log of accepted timestamps, pruned to the last windowMs.
 *
 * Keys whose window has expired are swept at most once per windowMs, from
 * within `check`; no timers are registered.
 */
export class RateLimiter {
  private readonly fixedWindows = new Map<string, FixedWindowEntry>();
  private readonly requestLogs = new Map<string, number[]>();
  private readonly strategy: RateLimitStrategy;
  private readonly now: () => number;
  private lastSweepAt = Number.NEGATIVE_INFINITY;

  constructor(private readonly options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests < 1) {
      throw new Error('maxRequests must be a positive integer');
    }
    if (!Number.isFinite(options.windowMs) || options.windowMs <= 0) {
      throw new Error('windowMs must be positive');
    }
    this.strategy = options.strategy ?? 'fixed-window';
    this.now = options.now ?? Date.now;
  }

  get limit(): number {
    return this.options.maxRequests;
  }

  /**
   * Record a request for the key and report whether it is allowed
   */
  check(key: string): RateLimitDecision {
    const now = this.now();
    this.sweepExpired(now);
    return this.strategy === 'sliding-window'
      ? this.checkSlidingWindow(key, now)
      : this.checkFixedWindow(key, now);
  }

  allowRequest(key: string): boolean {
    return this.check(key).allowed;
  }

  /**
   * Forget one key, or every key when omitted
   */
  reset(key?: string): void {
    if (key === undefined) {
      this.fixedWindows.clear();
      this.requestLogs.clear();
      return;
    }
    this.fixedWindows.delete(key);
    this.requestLogs.delete(key);
  }

  /**
   * Number of keys currently tracked
   */
  get trackedKeys(): number {
    return this.fixedWindows.size + this.requestLogs.size;
  }

  private sweepExpired(now: number): void {
    const { windowMs } = this.options;
    if (now - this.lastSweepAt < windowMs) {
      return;
    }
    this.lastSweepAt = now;

    const windowId = Math.floor(now / windowMs);
    for (const [key, entry] of this.fixedWindows.entries()) {
      if (entry.windowId < windowId) {
        this.fixedWindows.delete(key);
      }
    }

    const windowStart = now - windowMs;
    for (const [key, log] of this.requestLogs.entries()) {
      if (log.length === 0 || log[log.length - 1] < windowStart) {
        this.requestLogs.delete(key);
      }
    }
  }

  private checkFixedWindow(key: string, now: number): RateLimitDecision {
    const { maxRequests, windowMs } = this.options;
    const windowId = Math.floor(now / windowMs);
    const resetAt = (windowId + 1) * windowMs;

    const entry = this.fixedWindows.get(key);
    if (!entry || entry.windowId !== windowId) {
      this.fixedWindows.set(key, { windowId, count: 1 });
      return {
        allowed: true,
        limit: maxRequests,
        remaining: maxRequests - 1,
        resetAt,
        retryAfterMs: 0,
      };
    }

    if (entry.count < maxRequests) {
      entry.count++;
      return {
        allowed: true,
        limit: maxRequests,
        remaining: maxRequests - entry.count,
        resetAt,
        retryAfterMs: 0,
      };
    }

    return {
      allowed: false,
      limit: maxRequests,
      remaining: 0,
      resetAt,
      retryAfterMs: resetAt - now,
    };
  }

  private checkSlidingWindow(key: string, now: number): RateLimitDecision {
    const { maxRequests, windowMs } = this.options;
    const windowStart = now - windowMs;

    const log = (this.requestLogs.get(key) ?? []).filter(
      (timestamp) => timestamp >= windowStart,
    );

    if (log.length < maxRequests) {
      log.push(now);
      this.requestLogs.set(key, log);
      return {
        allowed: true,
        limit: maxRequests,
        remaining: maxRequests - log.length,
        resetAt: log[0] + windowMs,
        retryAfterMs: 0,
      };
    }

    this.requestLogs.set(key, log);
    const resetAt = log[0] + windowMs;
    return {
      allowed: false,
      limit: maxRequests,
      remaining: 0,
      resetAt,
      retryAfterMs: resetAt - now,
    };
  }
}
