export interface CacheLike {
  get<T = unknown>(key: string): Promise<T | null>;
  set<T = unknown>(key: string, val: T, ttlSec?: number): Promise<void>;
  /** Stored value as written, without JSON decoding. */
  getRaw(key: string): Promise<string | null>;
}

// The subset of the ioredis client the cache relies on
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', ttlSec: number): Promise<unknown>;
}

export class MemoryCache implements CacheLike {
  private m = new Map<string, { exp: number; val: unknown }>();
  constructor(private ttlSec: number, private now: () => number = Date.now) {}
  private entry(key: string) {
    const e = this.m.get(key);
    if (!e) return null;
    if (this.now() >= e.exp) { this.m.delete(key); return null; }
    return e;
  }
  async get<T>(key: string): Promise<T | null> {
    const e = this.entry(key);
    // values are only ever written through set<T>
    return e ? e.val as T : null;
  }
  async getRaw(key: string): Promise<string | null> {
    const e = this.entry(key);
    if (!e) return null;
    return typeof e.val === 'string' ? e.val : JSON.stringify(e.val);
  }
  async set<T>(key: string, val: T, ttlSec?: number) {
    this.m.set(key, { exp: this.now() + (ttlSec ?? this.ttlSec) * 1000, val });
  }
}

export class RedisCache implements CacheLike {
  constructor(private client: RedisLike, private defaultTtl: number) {}
  async get<T>(key: string): Promise<T | null> {
    const raw = await this.client.get(key);
    return raw ? JSON.parse(raw) as T : null;
  }
  async getRaw(key: string): Promise<string | null> {
    return await this.client.get(key);
  }
  async set<T>(key: string, val: T, ttl?: number) {
    await this.client.set(key, JSON.stringify(val), 'EX', ttl ?? this.defaultTtl);
  }
}
