/**
 * BandwidthService - Month-to-date outbound bandwidth of the hosting service
 *
 * Requests never wait on the metrics API: they read the last cached reading
 * from the shared store, and a stale reading is refreshed in the background by
 * whichever worker wins the refresh lock.
 */

import axios from 'axios';
import type { SettingsStoreInterface } from '../interfaces/SettingsStoreInterface.js';
import { compileValidator } from '../utils/jsonValidation.js';
import { createLogger, NAMESPACES } from '../logging.js';

const bandwidthLog = createLogger(NAMESPACES.services.bandwidth);

export const RENDER_BANDWIDTH_URL = 'https://api.render.com/v1/metrics/bandwidth';
export const BANDWIDTH_KEY = ':bandwidth';
export const BANDWIDTH_LOCK_KEY = ':bandwidth:lock';

interface BandwidthMetric {
  unit: string;
  values: Array<{ value?: number }>;
}

interface CachedReading {
  total: number;
  timestamp: number;
}

const validateMetrics = compileValidator<[BandwidthMetric]>({
  type: 'array',
  minItems: 1,
  maxItems: 1,
  items: {
    type: 'object',
    required: ['unit', 'values'],
    properties: {
      unit: { type: 'string' },
      values: { type: 'array', items: { type: 'object', properties: { value: { type: 'number' } } } }
    }
  }
});

const validateCached = compileValidator<CachedReading>({
  type: 'object',
  required: ['total', 'timestamp'],
  properties: { total: { type: 'number' }, timestamp: { type: 'number' } }
});

export interface BandwidthOptions {
  apiKey?: string;
  serviceId?: string;
  refreshMs: number;
  timeoutMs?: number;
  now?: () => number;
}

/** First instant of the current UTC month. */
export function monthStart(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
}

export class BandwidthService {
  private pending: Promise<void> | undefined;
  private readonly now: () => number;

  constructor(
    private readonly store: SettingsStoreInterface,
    private readonly options: BandwidthOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  get configured(): boolean {
    return Boolean(this.options.apiKey && this.options.serviceId);
  }

  /** Asks the metrics API directly. Undefined when the query fails. */
  async query(): Promise<number | undefined> {
    bandwidthLog('[BANDWIDTH] Querying Render ...');
    const end = new Date(this.now());
    try {
      const response = await axios.get(RENDER_BANDWIDTH_URL, {
        timeout: this.options.timeoutMs ?? 30_000,
        params: {
          resource: this.options.serviceId,
          startTime: monthStart(end).toISOString(),
          endTime: end.toISOString()
        },
        headers: {
          Accept: 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`
        }
      });
      const parsed = validateMetrics(response.data);
      if (!parsed.valid) {
        bandwidthLog('[BANDWIDTH] Query failed: unexpected response');
        return undefined;
      }
      const [usage] = parsed.data;
      const total = usage.values.reduce((sum, entry) => sum + (entry.value ?? 0), 0);
      bandwidthLog(`[BANDWIDTH] Query succeeded: ${total.toFixed(2)} ${usage.unit}`);
      return total;
    } catch (error) {
      bandwidthLog(`[BANDWIDTH] Query failed: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }

  /**
   * Last known usage in MiB, undefined when unknown. Kicks off a background
   * refresh when the reading is missing or stale.
   */
  async usage(): Promise<number | undefined> {
    if (!this.configured) return undefined;

    const cached = await this.readCache();
    if (!cached || this.now() - cached.timestamp >= this.options.refreshMs) {
      this.scheduleRefresh();
    }
    return cached?.total;
  }

  /** Resolves once no background refresh is running. */
  async idle(): Promise<void> {
    await this.pending;
  }

  /** Refreshes the cached reading unless another worker already is. */
  async refresh(): Promise<void> {
    const lease = await this.store.lockKey(BANDWIDTH_LOCK_KEY, this.options.timeoutMs ?? 30_000);
    if (!lease) {
      return;
    }
    try {
      const total = await this.query();
      if (total !== undefined) {
        await this.store.setShared(BANDWIDTH_KEY, JSON.stringify({ total, timestamp: this.now() }));
      }
    } finally {
      await this.store.unlock(lease);
    }
  }

  private scheduleRefresh(): void {
    if (this.pending) return;
    this.pending = this.refresh()
      .catch((error: unknown) => {
        bandwidthLog(`[BANDWIDTH] Refresh failed: ${error instanceof Error ? error.message : String(error)}`);
      })
      .finally(() => {
        this.pending = undefined;
      });
  }

  private async readCache(): Promise<CachedReading | undefined> {
    const raw = await this.store.getShared(BANDWIDTH_KEY);
    if (!raw) return undefined;
    try {
      const parsed = validateCached(JSON.parse(raw));
      return parsed.valid ? parsed.data : undefined;
    } catch {
      bandwidthLog('[BANDWIDTH] Ignoring unreadable cached reading');
      return undefined;
    }
  }
}

export default BandwidthService;
