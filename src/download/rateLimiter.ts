export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Spaces request starts at least `minIntervalMs` apart, however many workers
 * share it. Slots are reserved synchronously, so concurrent callers queue up.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleepFn: SleepFn;
  private nextSlotAt = 0;

  constructor(minIntervalMs: number, now: () => number = Date.now, sleepFn: SleepFn = sleep) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
    this.now = now;
    this.sleepFn = sleepFn;
  }

  static perSecond(requestsPerSecond: number): RateLimiter {
    return new RateLimiter(requestsPerSecond > 0 ? 1000 / requestsPerSecond : 0);
  }

  async acquire(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;
    if (slot > now) {
      await this.sleepFn(slot - now);
    }
  }
}
