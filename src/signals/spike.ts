import { ConfigError } from '../errors.js';
import type { SpikeConfig } from './schemas.js';

const BPS = 10_000n;
export const MIN_SPIKE_SAMPLES = 3;

export function createSpikeConfig(thresholdBasisPoints: number): SpikeConfig {
  if (!Number.isInteger(thresholdBasisPoints) || thresholdBasisPoints <= 0) {
    throw new ConfigError(`spike threshold must be a positive integer, got ${thresholdBasisPoints}`);
  }
  return Object.freeze({ thresholdBasisPoints });
}

/** Relative move of the last price against the floor-mean of the ones before it. */
export function spikeBasisPoints(prices: readonly bigint[]): bigint | null {
  const n = prices.length;
  if (n < MIN_SPIKE_SAMPLES) return null;
  let sum = 0n;
  for (let i = 0; i < n - 1; i++) sum += prices[i];
  const avg = sum / BigInt(n - 1);
  const latest = prices[n - 1];
  if (avg === 0n || latest === 0n) return null;
  const diff = avg > latest ? avg - latest : latest - avg;
  return (diff * BPS) / avg;
}

export class SpikeDetector {
  readonly config: SpikeConfig;
  constructor(thresholdBasisPoints: number) {
    this.config = createSpikeConfig(thresholdBasisPoints);
  }

  /** prices oldest first */
  evaluate(prices: readonly bigint[]): boolean {
    const bp = spikeBasisPoints(prices);
    return bp != null && bp >= BigInt(this.config.thresholdBasisPoints);
  }
}
