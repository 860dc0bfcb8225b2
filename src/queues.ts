import { Queue, type JobsOptions } from 'bullmq';
import { Redis } from 'ioredis';
import { encodeContext } from './signals/codec.js';
import type { Hex, TrapResponse } from './signals/schemas.js';

export const RESPONSE_QUEUE = 'trap.response';

export type ResponseJob = {
  variant: TrapResponse['variant'];
  pairId: string;
  firedAt: number;
  context: Hex;
};

export interface ResponseSink {
  deliver(r: TrapResponse): Promise<void>;
}

const defaultJobOptions: JobsOptions = {
  attempts: 3,
  backoff: { type: 'exponential', delay: 500 },
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 1000 },
};

export function toResponseJob(r: TrapResponse): ResponseJob {
  return { variant: r.variant, pairId: r.pairId, firedAt: r.firedAt, context: encodeContext(r.context) };
}

export class LogResponseSink implements ResponseSink {
  async deliver(r: TrapResponse) {
    const ctx = r.context
      ? ` primary=${r.context.primaryPrice} fallback=${r.context.fallbackPrice} volume=${r.context.volumeMetric} matches=${r.context.triggerCount}`
      : '';
    console.warn(`[response] ${r.variant} fired for ${r.pairId}${ctx}`);
  }
}

/** Hands fired responses to an external executor through a bullmq queue. */
export class QueueResponseSink implements ResponseSink {
  constructor(private readonly queue: Queue<ResponseJob>) {}
  async deliver(r: TrapResponse) {
    const job = toResponseJob(r);
    await this.queue.add(r.variant, job, { jobId: `${r.variant}-${r.pairId}-${r.firedAt}` });
  }
}

export function createResponseQueue(redisUrl: string): { queue: Queue<ResponseJob>; close: () => Promise<void> } {
  const connection = new Redis(redisUrl, { maxRetriesPerRequest: null });
  const queue = new Queue<ResponseJob>(RESPONSE_QUEUE, { connection, defaultJobOptions });
  return {
    queue,
    close: async () => { await queue.close(); await connection.quit(); },
  };
}
