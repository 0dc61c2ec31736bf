/**
 * SettingsStoreInterface - Abstraction layer for per-caller settings storage
 * Enables swapping backends (in-process, Redis) without touching request handling
 */

import type { Xuid } from '../identity/xuid.js';

export type SettingsValue = string | number | boolean | null;

/** Flat per-caller record. Serialized as a plain JSON object by distributed backends. */
export type SettingsRecord = Record<string, SettingsValue>;

export interface StoredSettings {
  record: SettingsRecord;
  existed: boolean;
}

export type SettingsStoreProvider = 'local' | 'redis';

/**
 * One acquisition of a lock. Releasing goes through the lease, so a holder
 * whose lock expired can never release the lock of whoever took it next.
 */
export interface LockLease {
  readonly key: string;
  readonly token: string;
}

/** Shared key holding the broadcast announcement. */
export const ANNOUNCEMENT_KEY = ':announcement';

export interface SettingsStoreInterface {
  readonly provider: SettingsStoreProvider;

  /**
   * Loads a caller's record.
   *
   * @returns an empty record with `existed: false` if the caller was never stored
   */
  get(xuid: Xuid): Promise<StoredSettings>;

  /**
   * Overwrites a caller's record unconditionally.
   *
   * @returns true if a record already existed before this write
   */
  put(xuid: Xuid, record: SettingsRecord): Promise<boolean>;

  /**
   * Administrative purge of a caller's record.
   *
   * @throws UserNotFoundError if nothing is stored for the caller
   */
  remove(xuid: Xuid): Promise<void>;

  /**
   * Non-blocking attempt to take the caller's lock.
   * Resolves to null immediately when someone (including a crashed holder
   * whose lock has not yet expired) already holds it.
   */
  lock(xuid: Xuid): Promise<LockLease | null>;

  /** Same as {@link lock} for locks that are not tied to a caller. */
  lockKey(key: string, timeoutMs?: number): Promise<LockLease | null>;

  /**
   * Releases the lock if the lease still owns it. Releasing a lock that
   * expired and was re-acquired since is not an error.
   */
  unlock(lease: LockLease): Promise<void>;

  /** Reads a shared value. Missing or expired values read as undefined. */
  getShared(key: string): Promise<string | undefined>;

  /** Writes a shared value; an empty string deletes it. */
  setShared(key: string, value: string, ttlMs?: number): Promise<void>;

  /** Broadcast notice included in responses. Empty string means none. */
  getAnnouncement(): Promise<string>;

  setAnnouncement(text: string): Promise<void>;

  /** Number of keys held by the backend, -1 if unknown. */
  keyCount(): Promise<number>;

  close(): Promise<void>;
}
