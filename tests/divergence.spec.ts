import { describe, it, expect } from 'vitest';
import { countTriggers, divergenceBasisPoints, evaluateDivergence, meetsThreshold, sampleTriggers } from '../src/signals/divergence.js';
import type { DivergenceConfig } from '../src/signals/schemas.js';
import { E16, sample } from './helpers/samples.js';

const cfg = (over: Partial<DivergenceConfig> = {}): DivergenceConfig => ({
  divergenceThresholdBasisPoints: 400,
  volumeThreshold: 10n,
  requiredMatchCount: 1,
  ...over,
});

describe('divergence basis points', () => {
  it('measures against the smaller price and truncates', () => {
    expect(divergenceBasisPoints(105n * E16, 100n * E16)).toBe(500n);
    expect(divergenceBasisPoints(100n * E16, 105n * E16)).toBe(500n);
    expect(divergenceBasisPoints(7n, 3n)).toBe(13333n);
  });

  it('is undefined when either price is zero', () => {
    expect(divergenceBasisPoints(0n, 5n)).toBeNull();
    expect(divergenceBasisPoints(5n, 0n)).toBeNull();
  });
});

describe('divergence evaluation', () => {
  it('fires on a diverging sample with enough volume', () => {
    const d = evaluateDivergence([sample(105n * E16, 100n * E16, 50n)], cfg());
    expect(d).toEqual({
      fired: true,
      context: { primaryPrice: 105n * E16, fallbackPrice: 100n * E16, volumeMetric: 50n, triggerCount: 1 },
    });
  });

  it('stays quiet when the volume gate fails', () => {
    const d = evaluateDivergence([sample(105n * E16, 100n * E16, 50n)], cfg({ volumeThreshold: 100n }));
    expect(d).toEqual({ fired: false, context: null });
  });

  it('treats the threshold as inclusive', () => {
    expect(sampleTriggers(sample(104n, 100n, 10n), cfg())).toBe(true);
    expect(sampleTriggers(sample(103n, 100n, 10n), cfg())).toBe(false);
  });

  it('never fires on an empty window', () => {
    expect(evaluateDivergence([], cfg({ requiredMatchCount: 0 }))).toEqual({ fired: false, context: null });
  });

  it('never counts equal prices, whatever the volume', () => {
    const s = sample(100n * E16, 100n * E16, 10n ** 30n);
    expect(divergenceBasisPoints(s.primaryPrice, s.fallbackPrice)).toBe(0n);
    expect(sampleTriggers(s, cfg({ divergenceThresholdBasisPoints: 1, volumeThreshold: 0n }))).toBe(false);
  });

  it('skips zero-price samples instead of failing', () => {
    const window = [sample(0n, 100n, 50n), sample(100n, 0n, 50n), sample(105n, 100n, 50n)];
    expect(countTriggers(window, cfg())).toBe(1);
    expect(evaluateDivergence(window, cfg({ requiredMatchCount: 2 }))).toEqual({ fired: false, context: null });
  });

  it('fires on any non-empty window when no matches are required', () => {
    const d = evaluateDivergence([sample(0n, 0n, 3n, 99)], cfg({ requiredMatchCount: 0 }));
    expect(d).toEqual({ fired: true, context: { primaryPrice: 0n, fallbackPrice: 0n, volumeMetric: 3n, triggerCount: 0 } });
  });

  it('reports the newest sample even when older ones carried the count', () => {
    const window = [
      sample(100n, 100n, 1n),
      sample(110n, 100n, 20n),
      sample(100n, 120n, 30n),
    ];
    const d = evaluateDivergence(window, cfg({ requiredMatchCount: 2 }));
    expect(d).toEqual({ fired: true, context: { primaryPrice: 100n, fallbackPrice: 100n, volumeMetric: 1n, triggerCount: 2 } });
  });

  it('is idempotent over the same window', () => {
    const window = Object.freeze([sample(105n, 100n, 50n), sample(100n, 104n, 50n)]);
    const a = evaluateDivergence(window, cfg({ requiredMatchCount: 2 }));
    const b = evaluateDivergence(window, cfg({ requiredMatchCount: 2 }));
    expect(a).toEqual(b);
    expect(a.fired).toBe(true);
  });

  it('never gains matches as the threshold rises', () => {
    const window = [
      sample(101n, 100n, 50n),
      sample(103n, 100n, 50n),
      sample(100n, 108n, 50n),
      sample(150n, 100n, 50n),
      sample(0n, 100n, 50n),
    ];
    const counts = [0, 100, 300, 301, 800, 5000, 5001].map(t => countTriggers(window, cfg({ divergenceThresholdBasisPoints: t })));
    expect(counts).toEqual([4, 4, 3, 2, 2, 1, 0]);
  });

  it('handles fractional thresholds without faulting', () => {
    const c = cfg({ divergenceThresholdBasisPoints: 400.5 });
    expect(sampleTriggers(sample(104n, 100n, 10n), c)).toBe(false);
    expect(sampleTriggers(sample(10401n, 10000n, 10n), c)).toBe(true);
    expect(evaluateDivergence([sample(105n * E16, 100n * E16, 50n)], c).fired).toBe(true);
  });

  it('compares against non-finite thresholds', () => {
    expect(meetsThreshold(10n ** 30n, Infinity)).toBe(false);
    expect(meetsThreshold(0n, -Infinity)).toBe(true);
    expect(meetsThreshold(5n, Number.NaN)).toBe(false);
    expect(meetsThreshold(400n, 399.2)).toBe(true);
  });
});
