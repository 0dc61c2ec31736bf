import { randomBytes } from 'crypto';
import { ConfigManager, type ProxyConfig } from './configManager.js';
import { ConfigError } from './errors.js';
import { GeminiClient } from './llm/geminiClient.js';
import { Orchestrator } from './proxy/Orchestrator.js';
import { loadResources } from './resources.js';
import { createApp } from './server.js';
import { BandwidthService } from './services/BandwidthService.js';
import { StatisticsService } from './services/StatisticsService.js';
import { CooldownPolicy } from './utils/cooldown.js';
import SettingsStoreFactory from './utils/settingsStoreFactory.js';
import { createLogger, enableNamespaces, NAMESPACES } from './logging.js';

const serverLog = createLogger(NAMESPACES.server.main);

function resolveSalt(config: ProxyConfig): string | Uint8Array {
  if (config.xuidSecret) return config.xuidSecret;
  if (!config.development) {
    throw new ConfigError('An XUID secret is required outside development');
  }
  serverLog('[SERVER] WARNING: Using a random XUID secret, identities will not survive a restart');
  return randomBytes(32);
}

async function main(): Promise<void> {
  const configManager = new ConfigManager();
  const config = configManager.getConfig();
  enableNamespaces(config.debug.enabledNamespaces);

  const xuidSecret = resolveSalt(config);
  const cooldown = CooldownPolicy.parse(config.cooldown);
  const { store, counters } = await SettingsStoreFactory.createStorage({
    development: config.development,
    redisUrl: config.redisUrl,
    lockTimeoutMs: config.lockTimeoutMs
  });

  const resources = loadResources(config.resourcesDir, config.proxy);
  const statistics = new StatisticsService(counters);
  const bandwidth = new BandwidthService(store, {
    apiKey: config.render.apiKey,
    serviceId: config.render.serviceId,
    refreshMs: config.bandwidthRefreshMs
  });

  const orchestrator = new Orchestrator({
    store,
    provider: new GeminiClient({ baseURL: config.gemini.baseURL, timeoutMs: config.requestTimeoutMs }),
    statistics,
    bandwidth,
    cooldown,
    resources,
    xuidSecret,
    bannerVersion: config.bannerVersion
  });

  const app = createApp({ config, orchestrator, store, statistics, bandwidth, cooldown, xuidSecret });

  serverLog(`[SERVER] ${config.proxy.name} ${config.proxy.version} (admin: ${config.proxy.admin})`);
  serverLog(`[SERVER] Cooldown policy: ${cooldown.disabled ? 'disabled' : cooldown.toString()}`);
  serverLog(`[SERVER] Bandwidth monitoring ${bandwidth.configured ? 'enabled' : 'disabled'}`);
  serverLog(`[SERVER] ${resources.presets.size} presets loaded, prefill is ${resources.prefill.length} characters`);

  const server = app.listen(config.port, () => {
    serverLog(`[SERVER] Listening on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    serverLog(`[SERVER] ${signal} received, shutting down`);
    server.close(() => {
      bandwidth
        .idle()
        .then(() => store.close())
        .catch((error: unknown) => {
          serverLog(`[SERVER] Error during shutdown: ${error instanceof Error ? error.message : String(error)}`);
          process.exitCode = 1;
        });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error(error instanceof ConfigError ? `Configuration error: ${error.message}` : error);
  process.exit(1);
});
