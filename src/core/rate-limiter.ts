import { systemClock, type Clock } from './clock.js';

/**
 * Global request pacer for SEC EDGAR.
 *
 * SEC allows 10 requests per second per user-agent. One instance is shared by
 * every worker in the process. Two limits apply to each grant:
 * - consecutive grants are at least 1000 / requestsPerSecond ms apart
 * - no rolling one-second window holds more than floor(requestsPerSecond) grants
 *
 * Callers queue on a promise chain, so grants are handed out in FIFO order and
 * the bookkeeping below is only ever touched by one waiter at a time.
 */

const WINDOW_MS = 1000;

export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly windowCapacity: number;
  private readonly granted: number[] = [];
  private lastGrant = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();
  private total = 0;

  constructor(
    public readonly requestsPerSecond: number = 9.8,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new RangeError(`requestsPerSecond must be positive, got ${requestsPerSecond}`);
    }
    this.minIntervalMs = WINDOW_MS / requestsPerSecond;
    this.windowCapacity = Math.max(1, Math.floor(requestsPerSecond));
  }

  /** Resolves once the caller may issue exactly one request. */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    // Keep the chain alive even if a waiter's clock misbehaves
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  /** Number of grants handed out so far. */
  get issued(): number {
    return this.total;
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      while (this.granted.length > 0 && now - this.granted[0] >= WINDOW_MS) {
        this.granted.shift();
      }

      let waitMs = this.lastGrant + this.minIntervalMs - now;
      if (this.granted.length >= this.windowCapacity) {
        waitMs = Math.max(waitMs, this.granted[0] + WINDOW_MS - now);
      }

      if (waitMs <= 0) {
        this.lastGrant = now;
        this.granted.push(now);
        this.total += 1;
        return;
      }

      await this.clock.sleep(Math.ceil(waitMs));
    }
  }
}
