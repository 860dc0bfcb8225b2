import type { CacheLike } from '../cache.js';

export interface VolumeSource {
  readVolume(pairId: string): Promise<bigint>;
}

/** Placeholder policy: no volume data without an external augmentation pipeline. */
export class ZeroVolumeSource implements VolumeSource {
  async readVolume(_pairId: string): Promise<bigint> { return 0n; }
}

export class StaticVolumeSource implements VolumeSource {
  constructor(private readonly volume: bigint) {}
  async readVolume(_pairId: string): Promise<bigint> { return this.volume; }
}

export const volumeKey = (pairId: string) => `volume:${pairId}`;

// Decimal integer strings only; a JSON-quoted string is accepted as well.
export function parseVolume(raw: string | null): bigint {
  if (raw == null) return 0n;
  const v = raw.trim().replace(/^"(.*)"$/, '$1');
  return /^\d+$/.test(v) ? BigInt(v) : 0n;
}

/**
 * Volume published by an external pipeline under `volume:<pairId>`, read
 * as the raw stored string so fixed-point amounts keep full precision.
 * Missing or malformed entries read as 0.
 */
export class CachedVolumeSource implements VolumeSource {
  constructor(private readonly cache: CacheLike) {}
  async readVolume(pairId: string): Promise<bigint> {
    return parseVolume(await this.cache.getRaw(volumeKey(pairId)));
  }
}
