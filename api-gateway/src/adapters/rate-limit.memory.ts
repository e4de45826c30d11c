import { RateLimitPort, RateLimitResult } from "../core/ports";

interface WindowCount {
  windowStart: number;
  resetTime: number;
  count: number;
}

/**
 * Fixed-window request counter for a single gateway process.
 * Windows that have closed are swept at most once per `sweepIntervalMs`.
 */
export class MemoryRateLimiter implements RateLimitPort {
  private windows = new Map<string, WindowCount>();
  private nextSweep = 0;

  constructor(
    private now: () => number = Date.now,
    private sweepIntervalMs = 60_000
  ) {}

  async isAllowed(
    identifier: string,
    limit: number,
    windowMs: number
  ): Promise<RateLimitResult> {
    const now = this.now();
    this.sweep(now);

    const windowStart = Math.floor(now / windowMs) * windowMs;
    const resetTime = windowStart + windowMs;

    const current = this.windows.get(identifier);
    const count =
      current && current.windowStart === windowStart ? current.count + 1 : 1;
    this.windows.set(identifier, { windowStart, resetTime, count });

    return {
      allowed: count <= limit,
      remaining: Math.max(0, limit - count),
      resetTime,
    };
  }

  /** Number of identifiers currently tracked */
  size(): number {
    return this.windows.size;
  }

  clear(): void {
    this.windows.clear();
  }

  private sweep(now: number): void {
    if (now < this.nextSweep) return;
    this.nextSweep = now + this.sweepIntervalMs;

    for (const [identifier, entry] of this.windows) {
      if (entry.resetTime <= now) this.windows.delete(identifier);
    }
  }
}
