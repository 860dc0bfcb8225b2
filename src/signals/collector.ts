import { normalizeFeedReading } from '../feeds/normalize.js';
import type { FeedSource } from '../feeds/sources.js';
import { ZeroVolumeSource, type VolumeSource } from '../feeds/volume.js';
import type { Sample } from './schemas.js';

export type CollectorDeps = {
  primary: FeedSource;
  fallback: FeedSource;
  pairId: string;
  volume?: VolumeSource;
  now?: () => number;
};

/**
 * Reads both feeds and the volume metric once and packages them as a Sample.
 * Read-only against its sources; read failures propagate to the caller.
 */
export class SampleCollector {
  readonly pairId: string;
  private readonly primary: FeedSource;
  private readonly fallback: FeedSource;
  private readonly volume: VolumeSource;
  private readonly now: () => number;

  constructor(deps: CollectorDeps) {
    this.primary = deps.primary;
    this.fallback = deps.fallback;
    this.pairId = deps.pairId;
    this.volume = deps.volume ?? new ZeroVolumeSource();
    this.now = deps.now ?? Date.now;
  }

  async collect(): Promise<Sample> {
    const [p, f, volumeMetric] = await Promise.all([
      this.primary.readLatest(),
      this.fallback.readLatest(),
      this.volume.readVolume(this.pairId),
    ]);
    return Object.freeze({
      primaryPrice: normalizeFeedReading(p),
      fallbackPrice: normalizeFeedReading(f),
      volumeMetric: volumeMetric < 0n ? 0n : volumeMetric,
      capturedAt: this.now(),
    });
  }
}
