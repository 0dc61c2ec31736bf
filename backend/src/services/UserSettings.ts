/**
 * UserSettings - Per-caller state loaded at the start of a request and saved
 * at most once at its end. The caller's lock must be held for the lifetime of
 * an instance; nothing here guards against concurrent writers.
 */

import type { Xuid } from '../identity/xuid.js';
import type { SettingsRecord, SettingsStoreInterface } from '../interfaces/SettingsStoreInterface.js';

export const SETTINGS_VERSION = 1;

export const TOGGLES = ['advsettings', 'nobot', 'ooctrick', 'prefill', 'search', 'think'] as const;
export type Toggle = (typeof TOGGLES)[number];

export type ThinkText = 'keep' | 'remove';

const nowSeconds = () => Math.floor(Date.now() / 1000);

export class UserSettings {
  /** False once the caller's credential was rejected upstream; such callers are not saved. */
  valid = true;

  private constructor(
    private readonly store: SettingsStoreInterface | null,
    readonly xuid: Xuid,
    private readonly data: SettingsRecord,
    readonly exists: boolean,
    private readonly now: () => number
  ) {
    if (!exists) {
      data.timestamp_first_seen = now();
    }
    data.version = SETTINGS_VERSION;
  }

  static async load(
    store: SettingsStoreInterface,
    xuid: Xuid,
    now: () => number = nowSeconds
  ): Promise<UserSettings> {
    const { record, existed } = await store.get(xuid);
    return new UserSettings(store, xuid, record, existed, now);
  }

  /** Settings with nothing enabled that can never be saved, for connectivity tests. */
  static blank(xuid: Xuid, now: () => number = nowSeconds): UserSettings {
    return new UserSettings(null, xuid, {}, false, now);
  }

  get rcounter(): number {
    return this.integer('rcounter');
  }

  incrementRcounter(): void {
    this.data.rcounter = this.rcounter + 1;
  }

  getToggle(toggle: Toggle): boolean {
    return Boolean(this.data[`use_${toggle}`]);
  }

  setToggle(toggle: Toggle, value: boolean): void {
    this.data[`use_${toggle}`] = value;
  }

  get thinkText(): ThinkText {
    return this.data.think_text === 'keep' ? 'keep' : 'remove';
  }

  set thinkText(value: ThinkText) {
    this.data.think_text = value;
  }

  /** Seconds since the last save, undefined for a caller never saved. */
  lastSeen(): number | undefined {
    const timestamp = this.integer('timestamp_last_seen');
    if (!timestamp) return undefined;
    return this.now() - timestamp;
  }

  lastSeenMessage(): string {
    const seconds = this.lastSeen();
    if (seconds === undefined) return 'not seen before';
    return `last seen ${seconds.toLocaleString('en-US')}s ago`;
  }

  /** Marks `version` as seen and reports whether it had not been shown yet. */
  shouldShowBanner(version: number): boolean {
    if (this.integer('banner') !== version) {
      this.data.banner = version;
      return true;
    }
    return false;
  }

  async save(): Promise<void> {
    if (!this.store) return;
    this.data.timestamp_last_seen = this.now();
    await this.store.put(this.xuid, this.data);
  }

  /** Copy of the underlying record. */
  toRecord(): SettingsRecord {
    return { ...this.data };
  }

  private integer(key: string): number {
    const value = this.data[key];
    return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : 0;
  }
}

export default UserSettings;
