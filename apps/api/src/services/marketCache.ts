import type { MarketQuery, MarketSnapshot, MarketStats } from '../types/domain.js';
import { MarketDataUnavailable } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { marketStatsSchema, MarketSourceError, type MarketAggregator } from './marketAggregator.js';
import { metrics } from './metrics.js';
import { marketAggregationTimeoutMsByDefault, marketSnapshotTtlMsByDefault } from './policy.js';
import { withTimeout } from '../utils/async.js';
import { fingerprintOf } from '../utils/canonical.js';

export type SnapshotRepository = {
  loadSnapshot(key: string): MarketSnapshot | undefined;
  saveSnapshot(snapshot: MarketSnapshot): void;
};

export type MarketSnapshotCacheOptions = {
  aggregator: MarketAggregator;
  repository?: SnapshotRepository;
  ttlMs?: number;
  timeoutMs?: number;
  logger?: Logger;
};

export function normalizeMarketQuery(query: MarketQuery): MarketQuery {
  return {
    make: query.make.trim().toLowerCase(),
    model: query.model.trim().toLowerCase(),
    year: Math.trunc(query.year),
    fuel: query.fuel.trim().toLowerCase()
  };
}

export function snapshotKey(query: MarketQuery): string {
  const normalized = normalizeMarketQuery(query);
  return [normalized.make, normalized.model, normalized.year, normalized.fuel].join('|');
}

/**
 * TTL cache of market snapshots keyed by segment. At most one aggregation
 * runs per key; concurrent callers share it.
 */
export class MarketSnapshotCache {
  private readonly entries = new Map<string, MarketSnapshot>();
  private readonly inFlight = new Map<string, Promise<MarketSnapshot>>();
  private readonly aggregator: MarketAggregator;
  private readonly repository?: SnapshotRepository;
  private readonly logger: Logger;
  readonly ttlMs: number;
  readonly timeoutMs: number;

  constructor(options: MarketSnapshotCacheOptions) {
    this.aggregator = options.aggregator;
    this.repository = options.repository;
    this.logger = options.logger ?? silentLogger();
    this.ttlMs = options.ttlMs ?? marketSnapshotTtlMsByDefault();
    this.timeoutMs = options.timeoutMs ?? marketAggregationTimeoutMsByDefault();
  }

  isFresh(snapshot: MarketSnapshot, now = Date.now()): boolean {
    return now - snapshot.computedAt < this.ttlMs;
  }

  peek(key: string): MarketSnapshot | undefined {
    const cached = this.entries.get(key);
    if (cached) return cached;

    const stored = this.repository?.loadSnapshot(key);
    if (stored) {
      const frozen = Object.freeze({ ...stored, degraded: false });
      this.entries.set(key, frozen);
      return frozen;
    }

    return undefined;
  }

  invalidate(key: string): void {
    this.entries.delete(key);
  }

  async get(make: string, model: string, year: number, fuel: string): Promise<MarketSnapshot> {
    const query = normalizeMarketQuery({ make, model, year, fuel });
    const key = snapshotKey(query);

    const known = this.peek(key);
    if (known && this.isFresh(known)) {
      metrics.recordCache('hit');
      return known;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      metrics.recordCache('coalesced');
      return pending;
    }

    metrics.recordCache('miss');
    const task = this.recompute(query, key, known).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, task);
    return task;
  }

  private async recompute(query: MarketQuery, key: string, known: MarketSnapshot | undefined): Promise<MarketSnapshot> {
    let stats: MarketStats;

    try {
      stats = await withTimeout('market_aggregation', this.timeoutMs, async (signal) => {
        const raw = await this.aggregator.aggregate(query, { signal });
        const parsed = marketStatsSchema.safeParse(raw);
        if (!parsed.success) {
          throw new MarketSourceError('aggregate_payload_invalid');
        }
        return parsed.data;
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'aggregation_failed';

      if (known) {
        metrics.recordCache('degraded');
        this.logger.warn({ key, reason, computedAt: known.computedAt }, 'market_snapshot_degraded');
        return Object.freeze({ ...known, degraded: true });
      }

      this.logger.error({ key, reason }, 'market_snapshot_unavailable');
      throw new MarketDataUnavailable('No market snapshot available for segment', { key, reason });
    }

    const snapshot: MarketSnapshot = Object.freeze({
      ...query,
      ...stats,
      key,
      computedAt: Date.now(),
      fingerprint: fingerprintOf({ ...query, ...stats }),
      degraded: false
    });

    this.entries.set(key, snapshot);
    this.repository?.saveSnapshot(snapshot);
    this.logger.info({ key, listingCount: snapshot.listingCount }, 'market_snapshot_refreshed');
    return snapshot;
  }
}
