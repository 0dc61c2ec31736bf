/**
 * RedisSettingsStore - Implementation of SettingsStoreInterface on Redis
 * Records are JSON strings keyed by the caller's full Xuid; locks are
 * token-valued keys with an expiry so a crashed request cannot wedge a caller.
 */

import { randomUUID } from 'crypto';
import type { Xuid } from '../identity/xuid.js';
import {
  ANNOUNCEMENT_KEY,
  type LockLease,
  type SettingsRecord,
  type SettingsStoreInterface,
  type SettingsValue,
  type StoredSettings
} from '../interfaces/SettingsStoreInterface.js';
import type { RedisCommands } from './redisCommands.js';
import { UserNotFoundError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';

const redisStoreLog = createLogger(NAMESPACES.stores.redis);

export const DEFAULT_LOCK_TIMEOUT_MS = 60_000;

function isSettingsValue(value: unknown): value is SettingsValue {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

function parseRecord(raw: string): SettingsRecord {
  const parsed: unknown = JSON.parse(raw);
  const record: SettingsRecord = {};
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return record;
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (isSettingsValue(value)) record[key] = value;
  }
  return record;
}

export class RedisSettingsStore implements SettingsStoreInterface {
  readonly provider = 'redis' as const;

  private readonly lockTimeoutMs: number;

  constructor(private readonly client: RedisCommands, options: { lockTimeoutMs?: number } = {}) {
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  }

  async get(xuid: Xuid): Promise<StoredSettings> {
    const raw = await this.client.get(xuid.full);
    if (raw === null) {
      return { record: {}, existed: false };
    }
    return { record: parseRecord(raw), existed: true };
  }

  async put(xuid: Xuid, record: SettingsRecord): Promise<boolean> {
    const existed = await this.client.exists(xuid.full);
    await this.client.set(xuid.full, JSON.stringify(record));
    return existed;
  }

  async remove(xuid: Xuid): Promise<void> {
    if ((await this.client.del(xuid.full)) === 0) {
      throw new UserNotFoundError(xuid.full);
    }
  }

  async lock(xuid: Xuid): Promise<LockLease | null> {
    return this.lockKey(xuid.lockId);
  }

  async lockKey(key: string, timeoutMs = this.lockTimeoutMs): Promise<LockLease | null> {
    const token = randomUUID();
    return (await this.client.setIfAbsent(key, token, timeoutMs)) ? { key, token } : null;
  }

  async unlock(lease: LockLease): Promise<void> {
    if (!(await this.client.deleteIfEquals(lease.key, lease.token))) {
      // Expired while held and possibly re-acquired since; nothing to release.
      redisStoreLog(`[REDIS_STORE] Lock ${lease.key.slice(0, 8)} was no longer owned on release`);
    }
  }

  async getShared(key: string): Promise<string | undefined> {
    return (await this.client.get(key)) ?? undefined;
  }

  async setShared(key: string, value: string, ttlMs?: number): Promise<void> {
    if (!value) {
      await this.client.del(key);
      return;
    }
    await this.client.set(key, value, ttlMs);
  }

  async getAnnouncement(): Promise<string> {
    return (await this.getShared(ANNOUNCEMENT_KEY)) ?? '';
  }

  async setAnnouncement(text: string): Promise<void> {
    await this.setShared(ANNOUNCEMENT_KEY, text);
    redisStoreLog(`[REDIS_STORE] Announcement ${text ? 'set' : 'cleared'}`);
  }

  async keyCount(): Promise<number> {
    return this.client.keyCount();
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

export default RedisSettingsStore;
