// Lightweight validators for configuration and request bodies

export type InvariantResult = { ok: boolean; errs: string[] };

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const HEX_RE = /^0x([0-9a-fA-F]{2})*$/;
const UINT_RE = /^\d+$/;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export type FeedWiring = {
  rpcEndpoints: string[];
  primaryFeed: string;
  fallbackFeed: string;
  pairId: string;
};

export function validateFeedWiring(w: FeedWiring): InvariantResult {
  const errs: string[] = [];
  if (!w.rpcEndpoints.length) errs.push('rpc.missing');
  w.rpcEndpoints.forEach((u, i) => { if (!/^https?:\/\//.test(u)) errs.push(`rpc[${i}].scheme`); });
  if (!ADDRESS_RE.test(w.primaryFeed)) errs.push('primaryFeed.address');
  if (!ADDRESS_RE.test(w.fallbackFeed)) errs.push('fallbackFeed.address');
  if (w.primaryFeed && w.primaryFeed.toLowerCase() === w.fallbackFeed.toLowerCase()) errs.push('feeds.identical');
  if (!w.pairId.trim()) errs.push('pairId.missing');
  return { ok: errs.length === 0, errs };
}

export type BodyCheck<T> = { ok: true; value: T } | { ok: false; errs: string[] };

export function checkDivergenceBody(obj: unknown): BodyCheck<string[]> {
  if (!isRecord(obj) || !Array.isArray(obj.samples)) return { ok: false, errs: ['samples.missing'] };
  const errs: string[] = [];
  const value: string[] = [];
  obj.samples.forEach((s: unknown, i: number) => {
    if (typeof s !== 'string' || !HEX_RE.test(s)) errs.push(`samples[${i}].hex`);
    else value.push(s);
  });
  return errs.length ? { ok: false, errs } : { ok: true, value };
}

export function checkSpikeBody(obj: unknown): BodyCheck<bigint[]> {
  if (!isRecord(obj) || !Array.isArray(obj.prices)) return { ok: false, errs: ['prices.missing'] };
  const errs: string[] = [];
  const value: bigint[] = [];
  obj.prices.forEach((p: unknown, i: number) => {
    if (typeof p !== 'string' || !UINT_RE.test(p)) errs.push(`prices[${i}].uint`);
    else value.push(BigInt(p));
  });
  return errs.length ? { ok: false, errs } : { ok: true, value };
}

export function maskInvariantErrors(errs: string[]): string {
  return Array.from(new Set(errs)).slice(0, 10).join(', ');
}
