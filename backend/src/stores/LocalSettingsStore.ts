/**
 * LocalSettingsStore - In-process implementation of SettingsStoreInterface
 * Nothing survives a restart and nothing is shared between processes, so this
 * is only suitable for a single development worker.
 */

import { randomUUID } from 'crypto';
import type { Xuid } from '../identity/xuid.js';
import {
  ANNOUNCEMENT_KEY,
  type LockLease,
  type SettingsRecord,
  type SettingsStoreInterface,
  type StoredSettings
} from '../interfaces/SettingsStoreInterface.js';
import { UserNotFoundError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';

const localStoreLog = createLogger(NAMESPACES.stores.local);

/** Exclusive in-process lock. An expiry of 0 means the lock never times out. */
class LocalLock {
  private expiresAt: number | null = null;
  private token: string | null = null;

  /** Returns the holder's token, or null while someone else holds it. */
  acquire(now: number, timeoutMs = 0): string | null {
    if (this.expiresAt !== null && (this.expiresAt === 0 || this.expiresAt > now)) {
      return null;
    }
    this.expiresAt = timeoutMs > 0 ? now + timeoutMs : 0;
    this.token = randomUUID();
    return this.token;
  }

  release(token: string): boolean {
    if (this.token !== token) return false;
    this.expiresAt = null;
    this.token = null;
    return true;
  }
}

interface SharedEntry {
  value: string;
  expiresAt?: number;
}

export class LocalSettingsStore implements SettingsStoreInterface {
  readonly provider = 'local' as const;

  private records: Map<string, SettingsRecord> = new Map();
  private locks: Map<string, LocalLock> = new Map();
  private shared: Map<string, SharedEntry> = new Map();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(xuid: Xuid): Promise<StoredSettings> {
    const record = this.records.get(xuid.full);
    if (!record) {
      return { record: {}, existed: false };
    }
    // Hand out a copy so in-request mutation only lands on put()
    return { record: { ...record }, existed: true };
  }

  async put(xuid: Xuid, record: SettingsRecord): Promise<boolean> {
    const existed = this.records.has(xuid.full);
    this.records.set(xuid.full, { ...record });
    return existed;
  }

  async remove(xuid: Xuid): Promise<void> {
    if (!this.records.delete(xuid.full)) {
      throw new UserNotFoundError(xuid.full);
    }
  }

  async lock(xuid: Xuid): Promise<LockLease | null> {
    return this.lockKey(xuid.lockId);
  }

  async lockKey(key: string, timeoutMs = 0): Promise<LockLease | null> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new LocalLock();
      this.locks.set(key, lock);
    }
    const token = lock.acquire(this.now(), timeoutMs);
    return token === null ? null : { key, token };
  }

  async unlock(lease: LockLease): Promise<void> {
    const lock = this.locks.get(lease.key);
    if (lock?.release(lease.token)) {
      this.locks.delete(lease.key);
    } else {
      localStoreLog(`[LOCAL_STORE] Lock ${lease.key.slice(0, 8)} was no longer owned on release`);
    }
  }

  async getShared(key: string): Promise<string | undefined> {
    const entry = this.shared.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.shared.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async setShared(key: string, value: string, ttlMs?: number): Promise<void> {
    if (!value) {
      this.shared.delete(key);
      return;
    }
    this.shared.set(key, {
      value,
      expiresAt: ttlMs !== undefined ? this.now() + ttlMs : undefined
    });
  }

  async getAnnouncement(): Promise<string> {
    return (await this.getShared(ANNOUNCEMENT_KEY)) ?? '';
  }

  async setAnnouncement(text: string): Promise<void> {
    await this.setShared(ANNOUNCEMENT_KEY, text);
    localStoreLog(`[LOCAL_STORE] Announcement ${text ? 'set' : 'cleared'}`);
  }

  async keyCount(): Promise<number> {
    return this.records.size + this.shared.size;
  }

  async close(): Promise<void> {
    this.records.clear();
    this.locks.clear();
    this.shared.clear();
  }
}

export default LocalSettingsStore;
