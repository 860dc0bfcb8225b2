import { emitDivergence } from './decision.js';
import type { DivergenceConfig, DivergenceDecision, Sample } from './schemas.js';

const BPS = 10_000n;

function absDiff(a: bigint, b: bigint): bigint { return a > b ? a - b : b - a; }

/** floor(|p - f| * 10000 / min(p, f)); null when either price is 0. */
export function divergenceBasisPoints(primary: bigint, fallback: bigint): bigint | null {
  if (primary === 0n || fallback === 0n) return null;
  const min = primary < fallback ? primary : fallback;
  return (absDiff(primary, fallback) * BPS) / min;
}

/**
 * `bp >= threshold` for an integer bp and any numeric threshold; a
 * fractional threshold behaves like its ceiling.
 */
export function meetsThreshold(bp: bigint, threshold: number): boolean {
  if (Number.isNaN(threshold) || threshold === Infinity) return false;
  if (threshold === -Infinity) return true;
  return bp >= BigInt(Math.ceil(threshold));
}

export function sampleTriggers(s: Sample, cfg: DivergenceConfig): boolean {
  const bp = divergenceBasisPoints(s.primaryPrice, s.fallbackPrice);
  if (bp == null) return false;
  const divergenceOk = meetsThreshold(bp, cfg.divergenceThresholdBasisPoints);
  const volumeOk = s.volumeMetric >= cfg.volumeThreshold;
  return divergenceOk && volumeOk;
}

export function countTriggers(window: readonly Sample[], cfg: DivergenceConfig): number {
  let n = 0;
  for (const s of window) if (sampleTriggers(s, cfg)) n++;
  return n;
}

/**
 * Evaluate a newest-first window. Fires when at least `requiredMatchCount`
 * samples diverge past the threshold with enough volume; a count of 0 fires
 * on any non-empty window.
 */
export function evaluateDivergence(window: readonly Sample[], cfg: DivergenceConfig): DivergenceDecision {
  if (window.length === 0) return { fired: false, context: null };
  const triggerCount = countTriggers(window, cfg);
  return emitDivergence(window, triggerCount, triggerCount >= cfg.requiredMatchCount);
}
