import { bus } from '../observability/events.js';
import { collectMs, cycleErrorsTotal, evaluationsTotal, firedTotal, samplesTotal, skippedTicksTotal, windowSize } from '../metrics.js';
import type { ResponseSink } from '../queues.js';
import { decodeSample } from './codec.js';
import type { SpikeDetector } from './spike.js';
import type { DivergenceTrap } from './trap.js';
import type { Hex, TrapResponse } from './schemas.js';
import type { HistoryWindow } from './window.js';

type Stopper = () => void;

export type PollerOpts = {
  trap: DivergenceTrap;
  window: HistoryWindow<Hex>;
  sink: ResponseSink;
  intervalMs: number;
  spike?: SpikeDetector | null;
  now?: () => number;
};

export type CycleResult = { divergence: boolean; spike: boolean | null };

/**
 * One collect → append → evaluate pass. The window is mutated here and
 * nowhere else, so callers must not run two cycles at once.
 */
export async function runCycle(opts: PollerOpts): Promise<CycleResult> {
  const now = opts.now ?? Date.now;
  const t0 = now();
  const encoded = await opts.trap.collect();
  collectMs.observe(Math.max(0, now() - t0));
  samplesTotal.inc();
  opts.window.push(encoded);
  windowSize.set(opts.window.size);
  const sample = decodeSample(encoded);
  bus.emit('trap:sample', sample);

  const responses: TrapResponse[] = [];
  const d = opts.trap.evaluate(opts.window.newestFirst());
  evaluationsTotal.inc({ variant: 'divergence' });
  if (d.fired) responses.push({ variant: 'divergence', pairId: opts.trap.pairId, firedAt: now(), context: d.context });

  let spike: boolean | null = null;
  if (opts.spike) {
    // spike policy looks at the primary feed only, oldest first
    const prices = opts.window.oldestFirst().map(h => decodeSample(h).primaryPrice);
    spike = opts.spike.evaluate(prices);
    evaluationsTotal.inc({ variant: 'spike' });
    if (spike) responses.push({ variant: 'spike', pairId: opts.trap.pairId, firedAt: now(), context: null });
  }

  for (const r of responses) {
    firedTotal.inc({ variant: r.variant });
    bus.emit('trap:fired', r);
    await opts.sink.deliver(r);
  }
  return { divergence: d.fired, spike };
}

export function startTrapPoller(opts: PollerOpts): Stopper {
  let inflight = false;
  const tick = async () => {
    if (inflight) { skippedTicksTotal.inc(); return; }
    inflight = true;
    try {
      await runCycle(opts);
    } catch (e) {
      cycleErrorsTotal.inc();
      const err = e instanceof Error ? e : new Error(String(e));
      bus.emit('trap:error', err);
      console.error(`[poller] cycle failed: ${err.message}`);
    } finally {
      inflight = false;
    }
  };
  const id = setInterval(() => { void tick(); }, opts.intervalMs);
  return () => clearInterval(id);
}
