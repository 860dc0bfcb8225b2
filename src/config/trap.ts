import { validateFeedWiring } from '../contracts/invariants.js';
import { ConfigError } from '../errors.js';
import { createSpikeConfig } from '../signals/spike.js';
import type { DivergenceConfig, SpikeConfig } from '../signals/schemas.js';
import type { BreakerOptions } from '../circuit.js';

export type TrapConfig = {
  rpcEndpoints: string[];
  primaryFeed: string;
  fallbackFeed: string;
  pairId: string;
  divergence: DivergenceConfig;
  spike: SpikeConfig | null;
  windowSize: number;
  sampleIntervalMs: number;
  healthPort: number;
  redisUrl: string;
  responseQueueEnabled: boolean;
  breaker: BreakerOptions;
};

type Env = Record<string, string | undefined>;

export function readTrapConfig(env: Env = process.env): Readonly<TrapConfig> {
  const num = (k: string, d: number) => {
    const raw = env[k];
    if (raw == null || raw.trim() === '') return d;
    const n = Number(raw);
    return Number.isFinite(n) ? n : d;
  };
  const uint = (k: string, d: bigint) => {
    const v = (env[k] ?? '').trim();
    return /^\d+$/.test(v) ? BigInt(v) : d;
  };
  const str = (k: string) => (env[k] ?? '').trim();

  const rpcEndpoints = str('ETH_RPC').split(',').map(s => s.trim()).filter(Boolean);
  const wiring = {
    rpcEndpoints,
    primaryFeed: str('PRIMARY_FEED_ADDRESS'),
    fallbackFeed: str('FALLBACK_FEED_ADDRESS'),
    pairId: str('PAIR_ID'),
  };
  const check = validateFeedWiring(wiring);
  if (!check.ok) throw new ConfigError(`invalid feed configuration: ${check.errs.join(', ')}`, check.errs);

  // Thresholds are taken as given; only the spike threshold has a precondition.
  const divergence: DivergenceConfig = Object.freeze({
    divergenceThresholdBasisPoints: Math.floor(num('DIVERGENCE_THRESHOLD_BP', 400)),
    volumeThreshold: uint('VOLUME_THRESHOLD', 0n),
    requiredMatchCount: Math.floor(num('REQUIRED_MATCH_COUNT', 1)),
  });
  const spikeRaw = str('SPIKE_THRESHOLD_BP');
  const spike = spikeRaw ? createSpikeConfig(Number(spikeRaw)) : null;

  return Object.freeze({
    ...wiring,
    divergence,
    spike,
    windowSize: Math.max(1, Math.floor(num('WINDOW_SIZE', 10))),
    sampleIntervalMs: Math.max(250, num('SAMPLE_INTERVAL_MS', 12_000)),
    healthPort: num('HEALTH_PORT', 3100),
    redisUrl: str('REDIS_URL'),
    responseQueueEnabled: str('RESPONSE_QUEUE_ENABLED').toLowerCase() === 'true',
    breaker: Object.freeze({
      threshold: num('RPC_BREAKER_THRESHOLD', 3),
      cooldownMs: num('RPC_BREAKER_COOLDOWN_MS', 60_000),
      closeAfter: num('RPC_BREAKER_CLOSE_AFTER', 3),
    }),
  });
}
