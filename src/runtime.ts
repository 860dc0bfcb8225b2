import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';
import { MemoryCache, RedisCache, type CacheLike } from './cache.js';
import { Breaker } from './circuit.js';
import type { TrapConfig } from './config/trap.js';
import { ConfigError } from './errors.js';
import { AggregatorFeedSource } from './feeds/aggregator.js';
import { CachedVolumeSource } from './feeds/volume.js';
import { windowSize } from './metrics.js';
import { LogResponseSink, QueueResponseSink, createResponseQueue, type ResponseSink } from './queues.js';
import { RpcClient } from './rpc.js';
import { buildServer } from './server.js';
import { SampleCollector } from './signals/collector.js';
import { startTrapPoller } from './signals/poller.js';
import type { Hex } from './signals/schemas.js';
import { SpikeDetector } from './signals/spike.js';
import { DivergenceTrap } from './signals/trap.js';
import { HistoryWindow } from './signals/window.js';

export type Runtime = {
  app: FastifyInstance;
  trap: DivergenceTrap;
  window: HistoryWindow<Hex>;
  startPoller: () => () => void;
  close: () => Promise<void>;
};

/** Wires every collaborator from config. Throws before anything connects when the config is unusable. */
export function createRuntime(cfg: Readonly<TrapConfig>, opts: { logger?: boolean } = {}): Runtime {
  if (cfg.responseQueueEnabled && !cfg.redisUrl) {
    throw new ConfigError('RESPONSE_QUEUE_ENABLED requires REDIS_URL', ['redisUrl.missing']);
  }

  const breaker = new Breaker(cfg.breaker);
  const rpc = new RpcClient(cfg.rpcEndpoints.map(url => ({ url })), { breaker });

  let redis: Redis | null = null;
  let cache: CacheLike;
  if (cfg.redisUrl) {
    redis = new Redis(cfg.redisUrl);
    cache = new RedisCache(redis, 300);
  } else {
    cache = new MemoryCache(300);
  }

  const collector = new SampleCollector({
    primary: new AggregatorFeedSource('primary', cfg.primaryFeed, rpc),
    fallback: new AggregatorFeedSource('fallback', cfg.fallbackFeed, rpc),
    pairId: cfg.pairId,
    volume: new CachedVolumeSource(cache),
  });
  const trap = new DivergenceTrap(collector, cfg.divergence);
  const spike = cfg.spike ? new SpikeDetector(cfg.spike.thresholdBasisPoints) : null;
  const window = new HistoryWindow<Hex>(cfg.windowSize);
  windowSize.set(0);

  let sink: ResponseSink = new LogResponseSink();
  let closeQueue: (() => Promise<void>) | null = null;
  if (cfg.responseQueueEnabled) {
    const q = createResponseQueue(cfg.redisUrl);
    sink = new QueueResponseSink(q.queue);
    closeQueue = q.close;
  }

  const app = buildServer({ trap, spike, breaker, windowSize: () => window.size, logger: opts.logger ?? false });

  return {
    app,
    trap,
    window,
    startPoller: () => startTrapPoller({ trap, window, sink, spike, intervalMs: cfg.sampleIntervalMs }),
    close: async () => {
      await app.close();
      await closeQueue?.();
      await redis?.quit();
    },
  };
}

/** Startup failures must be visible to a supervisor. */
export function failStartup(e: unknown): never {
  console.error('[tripwire] failed to start', e instanceof Error ? e.stack ?? e.message : e);
  process.exit(1);
}

export function onUncaughtException(e: unknown) {
  console.error('[tripwire] uncaughtException', e instanceof Error ? e.stack : e);
  process.exitCode = 1;
}
