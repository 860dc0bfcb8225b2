import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: 'tripwire_process_' });

export const samplesTotal = new Counter({
  name: 'tripwire_samples_total',
  help: 'Samples collected',
  registers: [registry],
});

export const evaluationsTotal = new Counter({
  name: 'tripwire_evaluations_total',
  help: 'Window evaluations',
  labelNames: ['variant'] as const,
  registers: [registry],
});

export const firedTotal = new Counter({
  name: 'tripwire_fired_total',
  help: 'Evaluations that fired',
  labelNames: ['variant'] as const,
  registers: [registry],
});

export const cycleErrorsTotal = new Counter({
  name: 'tripwire_cycle_errors_total',
  help: 'Collect/evaluate cycles that failed',
  registers: [registry],
});

export const skippedTicksTotal = new Counter({
  name: 'tripwire_skipped_ticks_total',
  help: 'Ticks skipped because a cycle was still in flight',
  registers: [registry],
});

export const windowSize = new Gauge({
  name: 'tripwire_window_size',
  help: 'Samples currently held in the history window',
  registers: [registry],
});

export const collectMs = new Histogram({
  name: 'tripwire_collect_ms',
  help: 'Collect latency in milliseconds',
  buckets: [5, 25, 100, 250, 1000, 5000],
  registers: [registry],
});
