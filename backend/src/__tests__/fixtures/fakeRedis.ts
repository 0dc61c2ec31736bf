import type { RedisCommands } from '../../stores/redisCommands.js';

interface Entry {
  value: string;
  expiresAt?: number;
}

/**
 * In-process stand-in for the Redis adapter. Keeps strings and hashes in maps
 * and honours expiry against an injectable clock.
 */
export class FakeRedis implements RedisCommands {
  strings = new Map<string, Entry>();
  hashes = new Map<string, { fields: Map<string, number>; expiresAt?: number }>();
  quitCalled = false;

  constructor(public now: () => number = Date.now) {}

  private live(key: string): Entry | undefined {
    const entry = this.strings.get(key);
    if (entry && entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.strings.delete(key);
      return undefined;
    }
    return entry;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    this.strings.set(key, { value, expiresAt: ttlMs !== undefined ? this.now() + ttlMs : undefined });
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)) return false;
    await this.set(key, value, ttlMs);
    return true;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async del(key: string): Promise<number> {
    const existed = this.live(key) !== undefined;
    this.strings.delete(key);
    return existed ? 1 : 0;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    if (this.live(key)?.value !== value) return false;
    this.strings.delete(key);
    return true;
  }

  async incrementFields(hash: string, fields: string[], ttlSeconds: number): Promise<void> {
    const existing = this.hashes.get(hash) ?? { fields: new Map<string, number>() };
    for (const field of fields) {
      existing.fields.set(field, (existing.fields.get(field) ?? 0) + 1);
    }
    existing.expiresAt = this.now() + ttlSeconds * 1000;
    this.hashes.set(hash, existing);
  }

  async readHashes(hashes: string[]): Promise<Array<Record<string, string>>> {
    return hashes.map((hash) => {
      const entry = this.hashes.get(hash);
      if (!entry || (entry.expiresAt !== undefined && entry.expiresAt <= this.now())) return {};
      return Object.fromEntries([...entry.fields].map(([field, count]) => [field, String(count)]));
    });
  }

  async keyCount(): Promise<number> {
    return this.strings.size + this.hashes.size;
  }

  async quit(): Promise<void> {
    this.quitCalled = true;
  }
}
