/**
 * Exponential reconnection schedule with a cap and additive jitter
 */

import type { BackoffConfig } from "../types/config";

/**
 * Delay before attempt `attempt` (0-based), without jitter
 */
export function baseDelay(attempt: number, config: BackoffConfig): number {
  return Math.min(
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt),
    config.maxDelayMs
  );
}

/**
 * Stateful backoff schedule, reset after every successful connection
 */
export class Backoff {
  private attemptCount = 0;

  constructor(
    private readonly config: BackoffConfig,
    private readonly random: () => number = Math.random
  ) {}

  /**
   * Number of delays handed out since the last reset
   */
  get attempt(): number {
    return this.attemptCount;
  }

  /**
   * Delay for the next attempt; jitter is in [0, jitterMs) and never negative
   */
  next(): number {
    const base = baseDelay(this.attemptCount, this.config);
    const jitter = this.random() * this.config.jitterMs;
    this.attemptCount++;
    return Math.round(base + jitter);
  }

  reset(): void {
    this.attemptCount = 0;
  }
}
