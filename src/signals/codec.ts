import { CodecError } from '../errors.js';
import type { DivergenceContext, Hex, Sample } from './schemas.js';

// Fixed layout: consecutive 32-byte big-endian words, 0x-prefixed hex.
const WORD_HEX = 64;
const UINT256_MAX = (1n << 256n) - 1n;
const INT256_MIN = -(1n << 255n);
const INT256_MAX = (1n << 255n) - 1n;

export const EMPTY: Hex = '0x';

function word(v: bigint, label: string): string {
  if (v < 0n || v > UINT256_MAX) throw new CodecError(`${label} out of uint256 range`);
  return v.toString(16).padStart(WORD_HEX, '0');
}

export function encodeWords(values: Array<[label: string, v: bigint]>): Hex {
  return `0x${values.map(([label, v]) => word(v, label)).join('')}`;
}

export function decodeWords(hex: string, expected?: number): bigint[] {
  if (typeof hex !== 'string' || !/^0x([0-9a-fA-F]{2})*$/.test(hex)) throw new CodecError('invalid hex');
  const body = hex.slice(2);
  if (body.length % WORD_HEX !== 0) throw new CodecError(`length ${body.length / 2} is not a multiple of 32 bytes`);
  const n = body.length / WORD_HEX;
  if (expected != null && n !== expected) throw new CodecError(`expected ${expected} words, got ${n}`);
  const out: bigint[] = [];
  for (let i = 0; i < n; i++) out.push(BigInt(`0x${body.slice(i * WORD_HEX, (i + 1) * WORD_HEX)}`));
  return out;
}

/** Two's complement view of a 256-bit word. */
export function toInt256(w: bigint): bigint {
  return w > INT256_MAX ? w - (1n << 256n) : w;
}

export function fromInt256(v: bigint): bigint {
  if (v < INT256_MIN || v > INT256_MAX) throw new CodecError('value out of int256 range');
  return v < 0n ? v + (1n << 256n) : v;
}

function toSafeNumber(v: bigint, label: string): number {
  if (v > BigInt(Number.MAX_SAFE_INTEGER)) throw new CodecError(`${label} exceeds safe integer range`);
  return Number(v);
}

export function encodeSample(s: Sample): Hex {
  return encodeWords([
    ['primaryPrice', s.primaryPrice],
    ['fallbackPrice', s.fallbackPrice],
    ['volumeMetric', s.volumeMetric],
    ['capturedAt', BigInt(Math.floor(s.capturedAt))],
  ]);
}

export function decodeSample(hex: string): Sample {
  const [primaryPrice, fallbackPrice, volumeMetric, capturedAt] = decodeWords(hex, 4);
  return { primaryPrice, fallbackPrice, volumeMetric, capturedAt: toSafeNumber(capturedAt, 'capturedAt') };
}

export function encodeContext(c: DivergenceContext | null): Hex {
  if (!c) return EMPTY;
  return encodeWords([
    ['primaryPrice', c.primaryPrice],
    ['fallbackPrice', c.fallbackPrice],
    ['volumeMetric', c.volumeMetric],
    ['triggerCount', BigInt(c.triggerCount)],
  ]);
}

export function decodeContext(hex: string): DivergenceContext | null {
  if (hex === EMPTY) return null;
  const [primaryPrice, fallbackPrice, volumeMetric, triggerCount] = decodeWords(hex, 4);
  return { primaryPrice, fallbackPrice, volumeMetric, triggerCount: toSafeNumber(triggerCount, 'triggerCount') };
}
