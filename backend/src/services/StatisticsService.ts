import type { RedisCommands } from '../stores/redisCommands.js';
import { createLogger, NAMESPACES } from '../logging.js';

const statsLog = createLogger(NAMESPACES.services.statistics);

export const BUCKET_COUNT = 48;
export const BUCKET_INTERVAL_SECONDS = 30 * 60;
export const BUCKET_LIFESPAN_SECONDS = 25 * 60 * 60;

export type StatisticsBucket = { bucket: string; counters: Record<string, number> };

export interface CounterBackend {
  increment(bucket: string, fields: string[], ttlSeconds: number): Promise<void>;
  read(buckets: string[]): Promise<Array<Record<string, number>>>;
}

export class MemoryCounterBackend implements CounterBackend {
  private buckets: Map<string, { counters: Map<string, number>; expiresAt: number }> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  async increment(bucket: string, fields: string[], ttlSeconds: number): Promise<void> {
    let entry = this.buckets.get(bucket);
    if (!entry || entry.expiresAt <= this.now()) {
      entry = { counters: new Map(), expiresAt: 0 };
      this.buckets.set(bucket, entry);
    }
    for (const field of fields) {
      entry.counters.set(field, (entry.counters.get(field) ?? 0) + 1);
    }
    entry.expiresAt = this.now() + ttlSeconds * 1000;
  }

  async read(buckets: string[]): Promise<Array<Record<string, number>>> {
    return buckets.map((bucket) => {
      const entry = this.buckets.get(bucket);
      if (!entry || entry.expiresAt <= this.now()) return {};
      return Object.fromEntries(entry.counters);
    });
  }
}

export class RedisCounterBackend implements CounterBackend {
  constructor(private readonly client: RedisCommands) {}

  async increment(bucket: string, fields: string[], ttlSeconds: number): Promise<void> {
    await this.client.incrementFields(bucket, fields, ttlSeconds);
  }

  async read(buckets: string[]): Promise<Array<Record<string, number>>> {
    const hashes = await this.client.readHashes(buckets);
    return hashes.map((hash) =>
      Object.fromEntries(Object.entries(hash).map(([key, value]) => [key, Number.parseInt(value, 10)]))
    );
  }
}

/** Start of the half-hour bucket containing `epochSeconds`. */
export function bucketStart(epochSeconds: number): number {
  return Math.floor(epochSeconds / BUCKET_INTERVAL_SECONDS) * BUCKET_INTERVAL_SECONDS;
}

/** `:stats:YYYY-MM-DDTHH:MM` in UTC. */
export function bucketName(epochSeconds: number): string {
  return `:stats:${new Date(epochSeconds * 1000).toISOString().slice(0, 16)}`;
}

/** `a.b.c` -> `a`, `a.b`, `a.b.c` */
export function expandKey(fullKey: string): string[] {
  const parts = fullKey.split('.');
  return parts.map((_, i) => parts.slice(0, i + 1).join('.'));
}

/**
 * Rolling half-hourly request counters. Tracking is best effort: failures are
 * logged and never reach the caller.
 */
export class StatisticsService {
  constructor(
    private readonly backend: CounterBackend,
    private readonly nowSeconds: () => number = () => Date.now() / 1000
  ) {}

  async track(fullKey: string): Promise<void> {
    try {
      const bucket = bucketName(bucketStart(this.nowSeconds()));
      await this.backend.increment(bucket, expandKey(fullKey), BUCKET_LIFESPAN_SECONDS);
    } catch (error) {
      statsLog(`[STATS] Failed to track ${fullKey}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /** Non-empty buckets of the last day, oldest first. */
  async query(): Promise<StatisticsBucket[]> {
    const start = bucketStart(this.nowSeconds());
    const buckets = Array.from({ length: BUCKET_COUNT }, (_, delta) =>
      bucketName(start - delta * BUCKET_INTERVAL_SECONDS)
    );
    const counters = await this.backend.read(buckets);

    const result: StatisticsBucket[] = [];
    buckets.forEach((bucket, i) => {
      if (Object.keys(counters[i] ?? {}).length > 0) {
        result.push({ bucket, counters: counters[i] });
      }
    });
    return result.reverse();
  }
}

export default StatisticsService;
