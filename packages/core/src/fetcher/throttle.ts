export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const defaultSleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

/**
 * Minimum spacing between requests of one fetcher instance (a single token, not per origin).
 * Waiters queue up so concurrent callers on the same instance still respect the interval.
 */
export class Throttle {
  private lastRequestAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly sleep: Sleep = defaultSleep,
    private readonly clock: Clock = Date.now,
  ) {}

  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot());
    this.queue = turn;
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const elapsed = this.clock() - this.lastRequestAt;
      if (elapsed < this.minIntervalMs) {
        await this.sleep(this.minIntervalMs - elapsed);
      }
    }
    this.lastRequestAt = this.clock();
  }
}
