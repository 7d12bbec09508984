/**
 * Spaces consecutive calls to a rate-limited destination
 */

import { sleep } from './retry.js';

export class RateLimiter {
  private lastCallTime: number | null = null;
  private readonly minIntervalMs: number;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    minIntervalMs: number,
    options: { sleepFn?: (ms: number) => Promise<void>; now?: () => number } = {}
  ) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
    this.sleepFn = options.sleepFn ?? sleep;
    this.now = options.now ?? Date.now;
  }

  static perSecond(requestsPerSecond: number): RateLimiter {
    return new RateLimiter(Math.ceil(1000 / requestsPerSecond));
  }

  /**
   * The first call never waits; later calls wait out the remainder of the interval.
   */
  async waitForSlot(): Promise<void> {
    if (this.lastCallTime !== null) {
      const timeSinceLastCall = this.now() - this.lastCallTime;
      const waitTime = Math.max(0, this.minIntervalMs - timeSinceLastCall);

      if (waitTime > 0) {
        await this.sleepFn(waitTime);
      }
    }

    this.lastCallTime = this.now();
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.waitForSlot();
    return fn();
  }
}
