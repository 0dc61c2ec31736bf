import { describe, it, expect } from 'vitest';
import { Xuid } from '../identity/xuid.js';
import { LocalSettingsStore } from '../stores/LocalSettingsStore.js';
import { SETTINGS_VERSION, UserSettings } from '../services/UserSettings.js';

const xuid = new Xuid('test-key', 'test-salt');

describe('UserSettings', () => {
  it('stamps a new caller with first-seen and version', async () => {
    const store = new LocalSettingsStore();
    const user = await UserSettings.load(store, xuid, () => 1_700_000_000);

    expect(user.exists).toBe(false);
    expect(user.rcounter).toBe(0);
    expect(user.lastSeen()).toBeUndefined();
    expect(user.lastSeenMessage()).toBe('not seen before');
    expect(user.toRecord()).toEqual({ timestamp_first_seen: 1_700_000_000, version: SETTINGS_VERSION });
  });

  it('persists counter, toggles and timestamps on save', async () => {
    const store = new LocalSettingsStore();
    let clock = 1_700_000_000;
    const first = await UserSettings.load(store, xuid, () => clock);
    first.incrementRcounter();
    first.setToggle('prefill', true);
    first.thinkText = 'keep';
    await first.save();

    clock += 4_321;
    const second = await UserSettings.load(store, xuid, () => clock);
    expect(second.exists).toBe(true);
    expect(second.rcounter).toBe(1);
    expect(second.getToggle('prefill')).toBe(true);
    expect(second.getToggle('think')).toBe(false);
    expect(second.thinkText).toBe('keep');
    expect(second.lastSeen()).toBe(4_321);
    expect(second.lastSeenMessage()).toBe('last seen 4,321s ago');
    expect(second.toRecord().timestamp_first_seen).toBe(1_700_000_000);
  });

  it('defaults think text to remove', async () => {
    const user = await UserSettings.load(new LocalSettingsStore(), xuid);
    expect(user.thinkText).toBe('remove');
  });

  it('shows each banner version once', async () => {
    const user = await UserSettings.load(new LocalSettingsStore(), xuid);
    expect(user.shouldShowBanner(3)).toBe(true);
    expect(user.shouldShowBanner(3)).toBe(false);
    expect(user.shouldShowBanner(4)).toBe(true);
  });

  it('ignores non-numeric stored values', async () => {
    const store = new LocalSettingsStore();
    await store.put(xuid, { rcounter: 'lots', timestamp_last_seen: null });
    const user = await UserSettings.load(store, xuid);
    expect(user.rcounter).toBe(0);
    expect(user.lastSeen()).toBeUndefined();
  });

  it('never writes blank settings', async () => {
    const store = new LocalSettingsStore();
    const blank = UserSettings.blank(xuid);
    blank.incrementRcounter();
    await blank.save();
    expect((await store.get(xuid)).existed).toBe(false);
    expect(blank.getToggle('advsettings')).toBe(false);
  });
});
