import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../src/server.js';
import { DivergenceTrap } from '../src/signals/trap.js';
import { SampleCollector } from '../src/signals/collector.js';
import { SpikeDetector } from '../src/signals/spike.js';
import { StaticFeedSource } from '../src/feeds/sources.js';
import { StaticVolumeSource } from '../src/feeds/volume.js';
import { Breaker } from '../src/circuit.js';
import { AggregatorFeedSource } from '../src/feeds/aggregator.js';
import { RpcClient } from '../src/rpc.js';
import { decodeSample, encodeSample } from '../src/signals/codec.js';
import { E16, sample } from './helpers/samples.js';

function makeTrap() {
  const collector = new SampleCollector({
    primary: new StaticFeedSource('p', 105n * E16),
    fallback: new StaticFeedSource('f', 100n * E16),
    pairId: 'ETH-USD',
    volume: new StaticVolumeSource(50n),
    now: () => 1_234,
  });
  return new DivergenceTrap(collector, { divergenceThresholdBasisPoints: 400, volumeThreshold: 10n, requiredMatchCount: 1 });
}

describe('http surface', () => {
  let app: FastifyInstance;
  afterEach(async () => { await app?.close(); });

  it('reports health and readiness', async () => {
    let t = 0;
    const breaker = new Breaker({ threshold: 1, cooldownMs: 100, now: () => t });
    app = buildServer({ trap: makeTrap(), spike: null, breaker, windowSize: () => 3 });
    expect((await app.inject({ method: 'GET', url: '/health' })).json()).toEqual({ ok: true, service: 'oracle-tripwire', window: 3 });
    expect((await app.inject({ method: 'GET', url: '/-/ready' })).statusCode).toBe(200);
    breaker.fail();
    const notReady = await app.inject({ method: 'GET', url: '/-/ready' });
    expect(notReady.statusCode).toBe(503);
    expect(notReady.json()).toEqual({ ready: false });
    t = 100;
    expect((await app.inject({ method: 'GET', url: '/-/ready' })).statusCode).toBe(200);
  });

  it('exposes prometheus metrics', async () => {
    app = buildServer({ trap: makeTrap(), spike: null });
    const res = await app.inject({ method: 'GET', url: '/metrics' });
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toContain('text/plain');
    expect(res.body).toContain('tripwire_samples_total');
  });

  it('collects an encoded sample', async () => {
    app = buildServer({ trap: makeTrap(), spike: null });
    const res = await app.inject({ method: 'POST', url: '/api/collect' });
    expect(decodeSample(res.json().sample)).toEqual(sample(105n * E16, 100n * E16, 50n, 1_234));
  });

  it('evaluates a divergence window', async () => {
    app = buildServer({ trap: makeTrap(), spike: null });
    const samples = [encodeSample(sample(105n * E16, 100n * E16, 50n))];
    const res = await app.inject({ method: 'POST', url: '/api/divergence/evaluate', payload: { samples } });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.fired).toBe(true);
    expect(body.decoded).toEqual({ primaryPrice: '1050000000000000000', fallbackPrice: '1000000000000000000', volumeMetric: '50', triggerCount: 1 });

    const quiet = await app.inject({ method: 'POST', url: '/api/divergence/evaluate', payload: { samples: [] } });
    expect(quiet.json()).toEqual({ fired: false, context: '0x', decoded: null });
  });

  it('rejects malformed windows', async () => {
    app = buildServer({ trap: makeTrap(), spike: null });
    const bad = await app.inject({ method: 'POST', url: '/api/divergence/evaluate', payload: { samples: ['nope', 1] } });
    expect(bad.statusCode).toBe(400);
    expect(bad.json()).toEqual({ ok: false, errors: 'samples[0].hex, samples[1].hex' });

    const short = await app.inject({ method: 'POST', url: '/api/divergence/evaluate', payload: { samples: ['0x00'] } });
    expect(short.statusCode).toBe(400);
    expect(short.json()).toEqual({ ok: false, error: 'length 1 is not a multiple of 32 bytes' });
  });

  it('evaluates spike windows when enabled', async () => {
    app = buildServer({ trap: makeTrap(), spike: new SpikeDetector(2000) });
    const hit = await app.inject({ method: 'POST', url: '/api/spike/evaluate', payload: { prices: ['100', '100', '100', '130'] } });
    expect(hit.json()).toEqual({ fired: true });
    const miss = await app.inject({ method: 'POST', url: '/api/spike/evaluate', payload: { prices: ['100', '100'] } });
    expect(miss.json()).toEqual({ fired: false });
    const bad = await app.inject({ method: 'POST', url: '/api/spike/evaluate', payload: { prices: ['-1'] } });
    expect(bad.statusCode).toBe(400);
  });

  it('answers 404 for spike when disabled', async () => {
    app = buildServer({ trap: makeTrap(), spike: null });
    const res = await app.inject({ method: 'POST', url: '/api/spike/evaluate', payload: { prices: [] } });
    expect(res.statusCode).toBe(404);
  });

  it('answers 500 when a feed contract returns nothing', async () => {
    const rpc = new RpcClient([{ url: 'http://rpc.test' }], {
      http: async () => ({ statusCode: 200, body: { json: async () => ({ jsonrpc: '2.0', id: 1, result: '0x' }) } }),
    });
    const collector = new SampleCollector({
      primary: new AggregatorFeedSource('primary', '0x00000000000000000000000000000000000000aa', rpc),
      fallback: new StaticFeedSource('f', 1n),
      pairId: 'ETH-USD',
    });
    app = buildServer({ trap: new DivergenceTrap(collector, { divergenceThresholdBasisPoints: 400, volumeThreshold: 0n, requiredMatchCount: 1 }), spike: null });
    const res = await app.inject({ method: 'POST', url: '/api/collect' });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ ok: false, error: 'internal error' });
  });
});
