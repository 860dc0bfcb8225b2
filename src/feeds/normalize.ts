import type { FeedReading } from '../signals/schemas.js';

/**
 * Signed feed reading → unsigned price. Negative readings clamp to 0 and are
 * kept; a zero price is treated as "no data" by the evaluators.
 *
 * No scaling happens here: both feeds of a pair must already share one
 * fixed-point base (e.g. 1e18).
 */
export function normalizeReading(raw: bigint): bigint {
  return raw < 0n ? 0n : raw;
}

export function normalizeFeedReading(r: FeedReading): bigint {
  return normalizeReading(r.rawValue);
}
