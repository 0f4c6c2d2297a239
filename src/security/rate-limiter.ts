// Fixed-window request counter keyed by route and client

interface Window {
  count: number;
  resetAt: number;
}

export type RateDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterSeconds: number };

export class FixedWindowLimiter {
  private windows = new Map<string, Window>();

  constructor(
    private readonly now: () => number = Date.now,
    private readonly sweepThreshold = 5000,
  ) {}

  consume(key: string, limit: number, windowMs: number): RateDecision {
    const now = this.now();
    if (this.windows.size >= this.sweepThreshold) this.sweep(now);

    const current = this.windows.get(key);
    if (!current || current.resetAt <= now) {
      this.windows.set(key, { count: 1, resetAt: now + windowMs });
      return { allowed: true, remaining: limit - 1 };
    }

    if (current.count >= limit) {
      return {
        allowed: false,
        retryAfterSeconds: Math.max(1, Math.ceil((current.resetAt - now) / 1000)),
      };
    }

    current.count += 1;
    return { allowed: true, remaining: limit - current.count };
  }

  clear(): void {
    this.windows.clear();
  }

  get size(): number {
    return this.windows.size;
  }

  private sweep(now: number): void {
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) this.windows.delete(key);
    }
  }
}
