import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from './errors.js';
import { LINK_TIMEOUT_MS, MAX_RESOLVED_LINKS } from './interfaces/GenerationProviderInterface.js';
import { compileValidator, type SchemaObject } from './utils/jsonValidation.js';
import { createLogger, NAMESPACES } from './logging.js';

const configLog = createLogger(NAMESPACES.config);

// Relative to the working directory, not this file
export const DEFAULT_CONFIG_PATH = path.resolve('backend', 'config', 'proxy.json');
export const DEFAULT_RESOURCES_DIR = path.resolve('backend', 'resources');

interface ConfigFile {
  port: number;
  development: boolean;
  proxy: {
    name: string;
    version: string;
    admin: string;
    url: string;
  };
  xuidSecret?: string;
  redisUrl?: string;
  cooldown: string;
  bandwidthWarningMiB: number;
  render: {
    apiKey?: string;
    serviceId?: string;
  };
  gemini: {
    baseURL: string;
  };
  processTimeoutSeconds: number;
  lockTimeoutMs?: number;
  bandwidthRefreshMs: number;
  bannerVersion: number;
  adminSecret?: string;
  resourcesDir: string;
  debug: {
    enabledNamespaces: string;
  };
}

type Nested = 'proxy' | 'render' | 'gemini' | 'debug';

export type ConfigInput = Partial<Omit<ConfigFile, Nested>> & { [K in Nested]?: Partial<ConfigFile[K]> };

const integer = (minimum: number, fallback: number) => ({ type: 'integer', minimum, default: fallback });
const secret = { type: 'string', minLength: 1 };

const ConfigSchema: SchemaObject = {
  type: 'object',
  properties: {
    port: { ...integer(0, 5000), maximum: 65535 },
    development: { type: 'boolean', default: false },
    proxy: {
      type: 'object',
      default: {},
      properties: {
        name: { type: 'string', default: 'RP Gemini Proxy' },
        version: { type: 'string', default: 'unknown' },
        admin: { type: 'string', default: 'Anonymous' },
        url: { type: 'string', default: '' }
      }
    },
    xuidSecret: secret,
    redisUrl: secret,
    cooldown: { type: 'string', default: '0' },
    // 75 GiB
    bandwidthWarningMiB: integer(0, 76800),
    render: {
      type: 'object',
      default: {},
      properties: {
        apiKey: { type: 'string' },
        serviceId: { type: 'string' }
      }
    },
    gemini: {
      type: 'object',
      default: {},
      properties: {
        baseURL: { type: 'string', pattern: '^https?://', default: 'https://generativelanguage.googleapis.com/v1beta' }
      }
    },
    // Hard limit of the hosting worker; upstream calls must finish well before it
    processTimeoutSeconds: integer(1, 90),
    lockTimeoutMs: { type: 'integer', minimum: 1 },
    bandwidthRefreshMs: integer(1, 10 * 60 * 1000),
    bannerVersion: integer(0, 1),
    adminSecret: secret,
    resourcesDir: { type: 'string', default: DEFAULT_RESOURCES_DIR },
    debug: {
      type: 'object',
      default: {},
      properties: {
        enabledNamespaces: { type: 'string', default: 'rpproxy:*' }
      }
    }
  }
};

const validateConfig = compileValidator<ConfigFile>(ConfigSchema);

export type ProxyConfig = DeepReadonly<
  Omit<ConfigFile, 'lockTimeoutMs'> & {
    /** Budget for one upstream call. */
    requestTimeoutMs: number;
    /** Expiry of a caller's lock. Always longer than a request can hold it. */
    lockTimeoutMs: number;
  }
>;

// Slack between the longest a request can hold its lock and the lock's expiry
const LOCK_MARGIN_MS = 5_000;

/** Upstream call plus grounding link resolution, both run under the caller's lock. */
export function lockHoldLimitMs(requestTimeoutMs: number): number {
  return requestTimeoutMs + MAX_RESOLVED_LINKS * LINK_TIMEOUT_MS;
}

type DeepReadonly<T> = { readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K] };

type Env = Record<string, string | undefined>;

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null) deepFreeze(child);
  }
  return Object.freeze(value);
}

function envInteger(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/** Environment overrides, on top of whatever the JSON file says. */
function envOverrides(env: Env): ConfigInput {
  const overrides: ConfigInput = {};
  const port = envInteger(env, 'PORT') ?? envInteger(env, 'RPPROXY_PORT');
  if (port !== undefined) overrides.port = port;
  if (env.RPPROXY_DEVELOPMENT) overrides.development = true;
  if (env.RPPROXY_XUID_SECRET) overrides.xuidSecret = env.RPPROXY_XUID_SECRET;
  if (env.RPPROXY_REDIS_URL) overrides.redisUrl = env.RPPROXY_REDIS_URL;
  if (env.RPPROXY_COOLDOWN !== undefined) overrides.cooldown = env.RPPROXY_COOLDOWN;
  if (env.RPPROXY_ADMIN_SECRET) overrides.adminSecret = env.RPPROXY_ADMIN_SECRET;
  if (env.RPPROXY_RESOURCES_DIR) overrides.resourcesDir = env.RPPROXY_RESOURCES_DIR;
  if (env.DEBUG) overrides.debug = { enabledNamespaces: env.DEBUG };

  const bandwidthWarning = envInteger(env, 'RPPROXY_BANDWIDTH_WARNING');
  if (bandwidthWarning !== undefined) overrides.bandwidthWarningMiB = bandwidthWarning;
  const processTimeout = envInteger(env, 'RPPROXY_PROCESS_TIMEOUT');
  if (processTimeout !== undefined) overrides.processTimeoutSeconds = processTimeout;
  const bannerVersion = envInteger(env, 'RPPROXY_BANNER_VERSION');
  if (bannerVersion !== undefined) overrides.bannerVersion = bannerVersion;

  const proxy: NonNullable<ConfigInput['proxy']> = {};
  if (env.RPPROXY_NAME) proxy.name = env.RPPROXY_NAME;
  if (env.RPPROXY_VERSION) proxy.version = env.RPPROXY_VERSION;
  if (env.RPPROXY_ADMIN) proxy.admin = env.RPPROXY_ADMIN;
  const url = env.RPPROXY_EXTERNAL_URL || env.RENDER_EXTERNAL_URL;
  if (url) proxy.url = url;
  if (Object.keys(proxy).length > 0) overrides.proxy = proxy;

  const render: NonNullable<ConfigInput['render']> = {};
  if (env.RPPROXY_RENDER_API_KEY) render.apiKey = env.RPPROXY_RENDER_API_KEY;
  if (env.RENDER_SERVICE_ID) render.serviceId = env.RENDER_SERVICE_ID;
  if (Object.keys(render).length > 0) overrides.render = render;

  return overrides;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function merge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? merge(current, value) : value;
  }
  return result;
}

export class ConfigManager {
  private config: ProxyConfig;

  constructor(
    private readonly configPath: string = DEFAULT_CONFIG_PATH,
    private readonly env: Env = process.env
  ) {
    this.config = this.loadConfig();
  }

  private readFile(): Record<string, unknown> {
    if (!fs.existsSync(this.configPath)) {
      configLog(`[CONFIG] No config file at ${this.configPath}, using defaults and environment`);
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        `Failed to read ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`${this.configPath} must contain a JSON object`);
    }
    return parsed;
  }

  private loadConfig(): ProxyConfig {
    const merged = merge(this.readFile(), envOverrides(this.env));
    const result = validateConfig(merged);
    if (!result.valid) {
      throw new ConfigError(`Invalid configuration: ${result.errors.join('; ')}`);
    }

    const parsed = result.data;
    // Only Render's own key format is honoured
    if (parsed.render.apiKey !== undefined && !parsed.render.apiKey.startsWith('rnd_')) {
      configLog('[CONFIG] Ignoring Render API key without the rnd_ prefix');
      parsed.render.apiKey = undefined;
    }

    const requestTimeoutMs = Math.max(parsed.processTimeoutSeconds - 15, 60) * 1000;
    const holdLimitMs = lockHoldLimitMs(requestTimeoutMs);
    if (parsed.lockTimeoutMs !== undefined && parsed.lockTimeoutMs <= holdLimitMs) {
      throw new ConfigError(
        `lockTimeoutMs (${parsed.lockTimeoutMs}) must exceed the ${holdLimitMs} ms a request may hold its lock`
      );
    }

    return deepFreeze({
      ...parsed,
      proxy: { ...parsed.proxy, url: parsed.proxy.url.replace(/\/+$/, '') },
      requestTimeoutMs,
      lockTimeoutMs: parsed.lockTimeoutMs ?? holdLimitMs + LOCK_MARGIN_MS
    });
  }

  getConfig(): ProxyConfig {
    return this.config;
  }

  reload(): void {
    this.config = this.loadConfig();
  }
}

export default ConfigManager;
