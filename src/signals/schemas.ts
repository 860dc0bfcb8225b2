export type Hex = `0x${string}`;

export type FeedReading = {
  rawValue: bigint; // signed, may be negative
  updatedAt: number; // ms epoch, reported by the feed
};

export type Sample = {
  primaryPrice: bigint;
  fallbackPrice: bigint;
  volumeMetric: bigint;
  capturedAt: number; // ms epoch
};

export type DivergenceConfig = {
  readonly divergenceThresholdBasisPoints: number;
  readonly volumeThreshold: bigint;
  readonly requiredMatchCount: number;
};

export type SpikeConfig = {
  readonly thresholdBasisPoints: number;
};

export type DivergenceContext = {
  primaryPrice: bigint;
  fallbackPrice: bigint;
  volumeMetric: bigint;
  triggerCount: number;
};

export type DivergenceDecision =
  | { fired: true; context: DivergenceContext }
  | { fired: false; context: null };

export type TrapVariant = 'divergence' | 'spike';

export type TrapResponse = {
  variant: TrapVariant;
  pairId: string;
  firedAt: number;
  context: DivergenceContext | null;
};
