/**
 * Settings Store Factory - Picks the storage backend once at startup
 * Request handling only ever sees SettingsStoreInterface and CounterBackend.
 */

import type { SettingsStoreInterface, SettingsStoreProvider } from '../interfaces/SettingsStoreInterface.js';
import LocalSettingsStore from '../stores/LocalSettingsStore.js';
import RedisSettingsStore from '../stores/RedisSettingsStore.js';
import { IoRedisCommands } from '../stores/redisCommands.js';
import { type CounterBackend, MemoryCounterBackend, RedisCounterBackend } from '../services/StatisticsService.js';
import { ConfigError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';

const factoryLog = createLogger(NAMESPACES.stores.factory);

export interface StorageOptions {
  development: boolean;
  redisUrl?: string;
  lockTimeoutMs?: number;
  /** Connection and command timeout for the distributed backend. */
  redisTimeoutMs?: number;
}

export interface StorageBackends {
  store: SettingsStoreInterface;
  counters: CounterBackend;
}

class SettingsStoreFactory {
  /**
   * Create the settings store and the matching statistics backend.
   *
   * A Redis URL always wins. Without one only a development deployment may
   * fall back to the in-process store.
   */
  static async createStorage(options: StorageOptions): Promise<StorageBackends> {
    const provider = this.selectProvider(options);

    switch (provider) {
      case 'redis': {
        // selectProvider only picks redis when a URL is set
        const commands = IoRedisCommands.fromUrl(options.redisUrl ?? '', options.redisTimeoutMs);
        await commands.ping();
        factoryLog('[STORE_FACTORY] Using Redis user storage');
        return {
          store: new RedisSettingsStore(commands, { lockTimeoutMs: options.lockTimeoutMs }),
          counters: new RedisCounterBackend(commands)
        };
      }
      case 'local':
        factoryLog('[STORE_FACTORY] WARNING: Using local user storage');
        return { store: new LocalSettingsStore(), counters: new MemoryCounterBackend() };
    }
  }

  static selectProvider(options: StorageOptions): SettingsStoreProvider {
    if (options.redisUrl) return 'redis';
    if (options.development) return 'local';
    throw new ConfigError('No user storage: a Redis URL is required outside development');
  }
}

export default SettingsStoreFactory;
export { SettingsStoreFactory };
