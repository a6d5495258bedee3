/**
 * Fixed-delay rate limiter for API calls
 *
 * Every call is followed by a cooldown of `delayMs`, whether it resolved or
 * rejected, so two consecutive calls are never closer than `delayMs`.
 */

export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RateLimiter {
  constructor(
    private readonly delayMs: number,
    private readonly wait: SleepFn = sleep
  ) {}

  /**
   * Requests per minute the configured delay allows
   */
  get requestsPerMinute(): number {
    return this.delayMs > 0 ? Math.floor(60000 / this.delayMs) : Infinity;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } finally {
      await this.wait(this.delayMs);
    }
  }
}
