import Fastify, { type FastifyInstance } from 'fastify';
import { checkDivergenceBody, checkSpikeBody, maskInvariantErrors } from './contracts/invariants.js';
import { CodecError } from './errors.js';
import { registry } from './metrics.js';
import type { Breaker } from './circuit.js';
import { decodeContext } from './signals/codec.js';
import type { SpikeDetector } from './signals/spike.js';
import type { DivergenceTrap } from './signals/trap.js';
import type { DivergenceContext } from './signals/schemas.js';

export type ServerDeps = {
  trap: DivergenceTrap;
  spike: SpikeDetector | null;
  breaker?: Breaker;
  windowSize?: () => number;
  logger?: boolean;
};

const serviceName = 'oracle-tripwire';

function contextJson(c: DivergenceContext | null) {
  if (!c) return null;
  return {
    primaryPrice: c.primaryPrice.toString(),
    fallbackPrice: c.fallbackPrice.toString(),
    volumeMetric: c.volumeMetric.toString(),
    triggerCount: c.triggerCount,
  };
}

export function buildServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({ logger: deps.logger ?? false });

  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof CodecError) return reply.code(400).send({ ok: false, error: err.message });
    app.log.error(err);
    return reply.code(500).send({ ok: false, error: 'internal error' });
  });

  app.get('/health', async () => ({ ok: true, service: serviceName, window: deps.windowSize?.() ?? 0 }));

  app.get('/-/ready', async (_req, reply) => {
    if (deps.breaker && deps.breaker.state() === 'open') {
      return reply.code(503).header('Retry-After', '30').send({ ready: false });
    }
    return { ready: true };
  });

  app.get('/metrics', async (_req, reply) => {
    reply.header('Content-Type', registry.contentType);
    return reply.send(await registry.metrics());
  });

  app.post('/api/collect', async () => ({ sample: await deps.trap.collect() }));

  app.post('/api/divergence/evaluate', async (req, reply) => {
    const check = checkDivergenceBody(req.body);
    if (!check.ok) return reply.code(400).send({ ok: false, errors: maskInvariantErrors(check.errs) });
    const [fired, context] = deps.trap.shouldRespond(check.value);
    return { fired, context, decoded: contextJson(decodeContext(context)) };
  });

  app.post('/api/spike/evaluate', async (req, reply) => {
    if (!deps.spike) return reply.code(404).send({ ok: false, error: 'spike detector disabled' });
    const check = checkSpikeBody(req.body);
    if (!check.ok) return reply.code(400).send({ ok: false, errors: maskInvariantErrors(check.errs) });
    return { fired: deps.spike.evaluate(check.value) };
  });

  return app;
}
