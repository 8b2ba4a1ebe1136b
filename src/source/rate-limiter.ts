import { sourceLogger } from "../logger.js";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Enforces a minimum interval between calls to the source system.
 *
 * Slots are reserved synchronously, so callers sharing one instance are
 * spaced out even when they call `acquire()` concurrently.
 */
export class RateLimiter {
  private nextSlotAt = 0;
  private calls = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly wait: Sleep = sleep
  ) {}

  async acquire(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;
    this.calls++;

    const waitTime = slot - now;
    if (waitTime > 0) {
      sourceLogger.debug({ waitTime }, "Rate limiting: waiting before request");
      await this.wait(waitTime);
    }
  }

  get callCount(): number {
    return this.calls;
  }
}
