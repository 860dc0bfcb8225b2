import { request } from 'undici';
import { Breaker } from './circuit.js';
import { RpcError } from './errors.js';

export interface RpcEndpoint { url: string }

export type HttpResponse = { statusCode: number; body: { json: () => Promise<unknown> } };
export type HttpImpl = (url: string, init: { method: 'POST'; headers: Record<string, string>; body: string }) => Promise<HttpResponse>;

const undiciHttp: HttpImpl = async (url, init) => {
  const res = await request(url, init);
  return { statusCode: res.statusCode, body: { json: () => res.body.json() } };
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

/** JSON-RPC client with round-robin failover, guarded by a breaker. */
export class RpcClient {
  private endpoints: RpcEndpoint[];
  private idx = 0;
  private seq = 0;
  readonly breaker: Breaker;
  private http: HttpImpl;

  constructor(endpoints: RpcEndpoint[], opts: { breaker?: Breaker; http?: HttpImpl } = {}) {
    this.endpoints = endpoints.filter(e => Boolean(e.url));
    if (!this.endpoints.length) throw new RpcError('no rpc endpoints configured');
    this.breaker = opts.breaker ?? new Breaker();
    this.http = opts.http ?? undiciHttp;
  }

  private next(): RpcEndpoint {
    const ep = this.endpoints[this.idx];
    this.idx = (this.idx + 1) % this.endpoints.length;
    return ep;
  }

  async call(method: string, params: unknown[]): Promise<unknown> {
    if (!this.breaker.allow()) throw new RpcError('rpc breaker open');
    const body = JSON.stringify({ jsonrpc: '2.0', id: ++this.seq, method, params });
    let lastErr: unknown;
    for (let i = 0; i < this.endpoints.length; i++) {
      const ep = this.next();
      try {
        const res = await this.http(ep.url, { method: 'POST', headers: { 'content-type': 'application/json' }, body });
        if (res.statusCode >= 400) throw new RpcError(`HTTP ${res.statusCode}`);
        const j = await res.body.json();
        if (!isRecord(j)) throw new RpcError('malformed rpc response');
        if (isRecord(j.error)) {
          const code = typeof j.error.code === 'number' ? j.error.code : undefined;
          throw new RpcError(typeof j.error.message === 'string' ? j.error.message : 'rpc error', code);
        }
        this.breaker.success();
        return j.result;
      } catch (e) { lastErr = e; }
    }
    this.breaker.fail();
    throw lastErr instanceof Error ? lastErr : new RpcError('rpc failover exhausted');
  }
}
