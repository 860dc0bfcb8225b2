import { decodeSample, encodeContext, encodeSample } from './codec.js';
import type { SampleCollector } from './collector.js';
import { evaluateDivergence } from './divergence.js';
import type { DivergenceConfig, DivergenceDecision, Hex } from './schemas.js';

export function createDivergenceConfig(c: DivergenceConfig): DivergenceConfig {
  return Object.freeze({ ...c });
}

/**
 * Collect/shouldRespond pair for the divergence policy. Samples cross the
 * boundary in their encoded form; the window is newest first.
 */
export class DivergenceTrap {
  readonly config: DivergenceConfig;
  constructor(private readonly collector: SampleCollector, config: DivergenceConfig) {
    this.config = createDivergenceConfig(config);
  }

  get pairId() { return this.collector.pairId; }

  async collect(): Promise<Hex> {
    return encodeSample(await this.collector.collect());
  }

  evaluate(window: readonly string[]): DivergenceDecision {
    return evaluateDivergence(window.map(decodeSample), this.config);
  }

  shouldRespond(window: readonly string[]): [fired: boolean, context: Hex] {
    const d = this.evaluate(window);
    return [d.fired, encodeContext(d.context)];
  }
}
