import { Redis } from 'ioredis';

/**
 * The handful of Redis operations the proxy needs. Stores and counters talk to
 * this instead of the client so tests can run against an in-process fake.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  /** SET NX PX: true when the key was created. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  del(key: string): Promise<number>;
  /** Deletes the key only if it still holds `value`. */
  deleteIfEquals(key: string, value: string): Promise<boolean>;
  /** HINCRBY each field by one, then EXPIRE the hash, in one round trip. */
  incrementFields(hash: string, fields: string[], ttlSeconds: number): Promise<void>;
  readHashes(hashes: string[]): Promise<Array<Record<string, string>>>;
  keyCount(): Promise<number>;
  quit(): Promise<void>;
}

// Compare-and-delete, so an expired lock re-acquired elsewhere is left alone.
const RELEASE_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end`;

export class IoRedisCommands implements RedisCommands {
  constructor(private readonly client: Redis) {}

  static fromUrl(url: string, timeoutMs = 30_000): IoRedisCommands {
    const client = new Redis(url, {
      connectTimeout: timeoutMs,
      commandTimeout: timeoutMs,
      lazyConnect: false
    });
    return new IoRedisCommands(client);
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    if (ttlMs !== undefined) {
      await this.client.set(key, value, 'PX', ttlMs);
    } else {
      await this.client.set(key, value);
    }
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const result = await this.client.set(key, value, 'PX', ttlMs, 'NX');
    return result === 'OK';
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) > 0;
  }

  async del(key: string): Promise<number> {
    return this.client.del(key);
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    const result = await this.client.eval(RELEASE_SCRIPT, 1, key, value);
    return result === 1;
  }

  async incrementFields(hash: string, fields: string[], ttlSeconds: number): Promise<void> {
    const pipeline = this.client.pipeline();
    for (const field of fields) {
      pipeline.hincrby(hash, field, 1);
    }
    pipeline.expire(hash, ttlSeconds);
    await pipeline.exec();
  }

  async readHashes(hashes: string[]): Promise<Array<Record<string, string>>> {
    const pipeline = this.client.pipeline();
    for (const hash of hashes) {
      pipeline.hgetall(hash);
    }
    const results = (await pipeline.exec()) ?? [];
    return results.map(([error, value]) => {
      if (error) throw error;
      return isStringRecord(value) ? value : {};
    });
  }

  async keyCount(): Promise<number> {
    return this.client.dbsize();
  }

  async quit(): Promise<void> {
    await this.client.quit();
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}
