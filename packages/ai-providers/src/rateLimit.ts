const MINUTE_MS = 60_000;

export interface CallRateLimiterOptions {
  /** Calls allowed to start within one window. Below 1 disables limiting. */
  limit: number;

  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sliding-window limit on recommendation calls.
 *
 * At most `limit` calls may start in any `windowMs` span (one minute by
 * default). `acquire()` resolves once the caller may start its call.
 */
export class CallRateLimiter {
  private readonly startedAt: number[] = [];
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: CallRateLimiterOptions) {
    this.limit = Math.floor(options.limit);
    this.windowMs = options.windowMs ?? MINUTE_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /** Builds a limiter from a requests-per-minute setting, or `null` when unset. */
  static perMinute(rpm: number | undefined): CallRateLimiter | null {
    if (typeof rpm !== 'number' || !Number.isFinite(rpm) || rpm < 1) return null;
    return new CallRateLimiter({ limit: rpm });
  }

  async acquire(): Promise<void> {
    if (this.limit < 1) return;

    for (;;) {
      const now = this.now();
      this.forgetBefore(now - this.windowMs);

      if (this.startedAt.length < this.limit) {
        this.startedAt.push(now);
        return;
      }

      // Full window: wait until the oldest call falls out of it.
      await this.sleep(this.startedAt[0] + this.windowMs - now);
    }
  }

  private forgetBefore(cutoff: number): void {
    while (this.startedAt.length > 0 && this.startedAt[0] <= cutoff) {
      this.startedAt.shift();
    }
  }
}
