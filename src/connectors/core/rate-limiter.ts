import { sleep } from "./retry.js";
import type { RateLimiter, RateLimiterConfig } from "./types.js";

/**
 * Spaces requests by a fixed minimum interval.
 *
 * There is no burst allowance: every `acquire()` waits until
 * `1000 / maxRequestsPerSecond` ms have passed since the previous one.
 * Callers that do not await each other are queued in arrival order.
 */
export class MinIntervalRateLimiter implements RateLimiter {
  readonly minIntervalMs: number;

  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private lastCallAt: number | null = null;
  private backoffUntil = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(config: RateLimiterConfig = {}) {
    const rate = config.maxRequestsPerSecond ?? 3;
    if (!(rate > 0)) {
      throw new RangeError(`maxRequestsPerSecond must be positive, got ${rate}`);
    }
    this.minIntervalMs = 1000 / rate;
    this.now = config.now ?? Date.now;
    this.sleep = config.sleep ?? sleep;
  }

  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot());
    // A rejected slot must not wedge the callers queued behind it
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  backoff(retryAfterMs: number): void {
    this.backoffUntil = Math.max(this.backoffUntil, this.now() + retryAfterMs);
  }

  private async waitForSlot(): Promise<void> {
    const now = this.now();
    let readyAt = this.backoffUntil;
    if (this.lastCallAt !== null) {
      readyAt = Math.max(readyAt, this.lastCallAt + this.minIntervalMs);
    }
    if (readyAt > now) {
      await this.sleep(readyAt - now);
    }
    this.lastCallAt = this.now();
  }
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new MinIntervalRateLimiter(config);
}
