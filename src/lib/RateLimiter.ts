export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Paces the batch loop. `wait` is awaited between two consecutive URLs.
 */
export interface RateLimiter {
  wait(): Promise<void>;
}

/**
 * Waits a constant delay, as a courtesy to the upstream rate limits.
 */
export class FixedDelayRateLimiter implements RateLimiter {
  private readonly delayMs: number;
  private readonly sleepFn: Sleep;

  constructor(delayMs: number, sleepFn: Sleep = sleep) {
    this.delayMs = delayMs;
    this.sleepFn = sleepFn;
  }

  async wait(): Promise<void> {
    if (this.delayMs <= 0) return;
    await this.sleepFn(this.delayMs);
  }
}
