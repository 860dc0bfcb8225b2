import type { DivergenceDecision, Sample } from './schemas.js';

// Context always describes the newest sample, even when older samples are the
// ones that met the bar; only triggerCount reflects the whole window.
export function emitDivergence(window: readonly Sample[], triggerCount: number, fired: boolean): DivergenceDecision {
  const latest = window[0];
  if (!fired || !latest) return { fired: false, context: null };
  return {
    fired: true,
    context: {
      primaryPrice: latest.primaryPrice,
      fallbackPrice: latest.fallbackPrice,
      volumeMetric: latest.volumeMetric,
      triggerCount,
    },
  };
}
