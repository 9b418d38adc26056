export interface CalibrationCache {
  readonly kind: "memory" | "redis";
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
}

export interface RedisLikeClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options?: { EX: number }): Promise<unknown>;
}

export class MemoryCalibrationCache implements CalibrationCache {
  readonly kind = "memory";
  private store = new Map<string, { value: unknown; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<unknown> {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const now = this.now();
    for (const [storedKey, entry] of this.store) {
      if (now >= entry.expiresAt) {
        this.store.delete(storedKey);
      }
    }
    this.store.set(key, { value, expiresAt: now + ttlSeconds * 1000 });
  }

  size(): number {
    return this.store.size;
  }
}

export class RedisCalibrationCache implements CalibrationCache {
  readonly kind = "redis";

  constructor(
    private readonly redis: RedisLikeClient,
    private readonly prefix = "calibration:"
  ) {}

  async get(key: string): Promise<unknown> {
    const raw = await this.redis.get(`${this.prefix}${key}`);
    if (!raw) return undefined;
    const value: unknown = JSON.parse(raw);
    return value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.redis.set(`${this.prefix}${key}`, JSON.stringify(value), { EX: ttlSeconds });
  }
}
