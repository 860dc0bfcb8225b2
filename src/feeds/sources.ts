import type { FeedReading } from '../signals/schemas.js';

export interface FeedSource {
  readonly id: string;
  readLatest(): Promise<FeedReading>;
}

/**
 * Scripted source: replays `values` in order and then keeps returning the
 * last one. Used for demos, dry runs and tests.
 */
export class StaticFeedSource implements FeedSource {
  private i = 0;
  private values: bigint[];
  constructor(readonly id: string, values: bigint | bigint[], private now: () => number = Date.now) {
    this.values = Array.isArray(values) ? [...values] : [values];
    if (!this.values.length) this.values = [0n];
  }
  async readLatest(): Promise<FeedReading> {
    const v = this.values[Math.min(this.i, this.values.length - 1)];
    this.i++;
    return { rawValue: v, updatedAt: this.now() };
  }
}
