import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MarketQuery, MarketSnapshot, MarketStats } from '../types/domain.js';
import { MarketDataUnavailable } from './errors.js';
import type { AggregateOptions, MarketAggregator } from './marketAggregator.js';
import { MarketSnapshotCache, snapshotKey, type SnapshotRepository } from './marketCache.js';
import { metrics } from './metrics.js';

const golfStats: MarketStats = {
  avgPrice: 20000,
  minPrice: 18000,
  maxPrice: 23000,
  listingCount: 12,
  confidence: 0.8
};

function memoryRepository(): SnapshotRepository & { saved: MarketSnapshot[] } {
  const rows = new Map<string, MarketSnapshot>();
  const saved: MarketSnapshot[] = [];
  return {
    saved,
    loadSnapshot(key) {
      return rows.get(key);
    },
    saveSnapshot(snapshot) {
      saved.push(snapshot);
      rows.set(snapshot.key, snapshot);
    }
  };
}

function aggregatorOf(impl: (query: MarketQuery, options?: AggregateOptions) => Promise<MarketStats>) {
  const aggregate = vi.fn(impl);
  const aggregator: MarketAggregator = { aggregate };
  return { aggregator, aggregate };
}

beforeEach(() => {
  metrics.reset();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('snapshotKey', () => {
  it('normalizes case and whitespace', () => {
    expect(snapshotKey({ make: ' Volkswagen ', model: 'GOLF', year: 2021, fuel: 'Petrol' })).toBe('volkswagen|golf|2021|petrol');
  });
});

describe('MarketSnapshotCache', () => {
  it('serves a fresh snapshot without recomputing', async () => {
    const { aggregator, aggregate } = aggregatorOf(async () => golfStats);
    const repository = memoryRepository();
    const cache = new MarketSnapshotCache({ aggregator, repository, ttlMs: 60_000, timeoutMs: 1_000 });

    const first = await cache.get('Volkswagen', 'Golf', 2021, 'petrol');
    const second = await cache.get('volkswagen', 'golf', 2021, 'PETROL');

    expect(aggregate).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(first.key).toBe('volkswagen|golf|2021|petrol');
    expect(first.avgPrice).toBe(20000);
    expect(first.degraded).toBe(false);
    expect(first.fingerprint).toMatch(/^sha256:[0-9a-f]{64}$/);
    expect(Object.isFrozen(first)).toBe(true);
    expect(repository.saved).toHaveLength(1);
    expect(metrics.snapshot().marketCache).toEqual({ miss: 1, hit: 1 });
  });

  it('recomputes once the TTL has elapsed', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));

    let avgPrice = 20000;
    const { aggregator, aggregate } = aggregatorOf(async () => ({ ...golfStats, avgPrice }));
    const cache = new MarketSnapshotCache({ aggregator, ttlMs: 60_000, timeoutMs: 1_000 });

    await cache.get('Volkswagen', 'Golf', 2021, 'petrol');
    vi.setSystemTime(new Date('2026-03-01T10:00:59.000Z'));
    await cache.get('Volkswagen', 'Golf', 2021, 'petrol');
    expect(aggregate).toHaveBeenCalledTimes(1);

    avgPrice = 20500;
    vi.setSystemTime(new Date('2026-03-01T10:01:00.000Z'));
    const refreshed = await cache.get('Volkswagen', 'Golf', 2021, 'petrol');

    expect(aggregate).toHaveBeenCalledTimes(2);
    expect(refreshed.avgPrice).toBe(20500);
    expect(refreshed.computedAt).toBe(Date.parse('2026-03-01T10:01:00.000Z'));
  });

  it('coalesces concurrent misses into one aggregation', async () => {
    let resolve: (stats: MarketStats) => void = () => undefined;
    const { aggregator, aggregate } = aggregatorOf(
      () => new Promise<MarketStats>((done) => {
        resolve = done;
      })
    );
    const cache = new MarketSnapshotCache({ aggregator, ttlMs: 60_000, timeoutMs: 1_000 });

    const pending = [
      cache.get('Volkswagen', 'Golf', 2021, 'petrol'),
      cache.get('Volkswagen', 'Golf', 2021, 'petrol'),
      cache.get('volkswagen', 'golf', 2021, 'petrol')
    ];
    await Promise.resolve();
    resolve(golfStats);
    const [a, b, c] = await Promise.all(pending);

    expect(aggregate).toHaveBeenCalledTimes(1);
    expect(b).toBe(a);
    expect(c).toBe(a);
    expect(metrics.snapshot().marketCache).toEqual({ miss: 1, coalesced: 2 });
  });

  it('falls back to the last known snapshot marked degraded', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));

    let fail = false;
    const { aggregator } = aggregatorOf(async () => {
      if (fail) throw new Error('source_down');
      return golfStats;
    });
    const repository = memoryRepository();
    const cache = new MarketSnapshotCache({ aggregator, repository, ttlMs: 60_000, timeoutMs: 1_000 });

    const fresh = await cache.get('Volkswagen', 'Golf', 2021, 'petrol');
    fail = true;
    vi.setSystemTime(new Date('2026-03-01T11:00:00.000Z'));
    const degraded = await cache.get('Volkswagen', 'Golf', 2021, 'petrol');

    expect(degraded.degraded).toBe(true);
    expect(degraded.avgPrice).toBe(fresh.avgPrice);
    expect(degraded.computedAt).toBe(fresh.computedAt);
    expect(fresh.degraded).toBe(false);
    expect(repository.saved).toHaveLength(1);
    expect(metrics.snapshot().marketCache.degraded).toBe(1);
  });

  it('reads a fresh snapshot from the repository before aggregating', async () => {
    const repository = memoryRepository();
    repository.saveSnapshot({
      make: 'volkswagen',
      model: 'golf',
      year: 2021,
      fuel: 'petrol',
      ...golfStats,
      key: 'volkswagen|golf|2021|petrol',
      computedAt: Date.now(),
      fingerprint: 'sha256:stored',
      degraded: false
    });
    const { aggregator, aggregate } = aggregatorOf(async () => golfStats);
    const cache = new MarketSnapshotCache({ aggregator, repository, ttlMs: 60_000, timeoutMs: 1_000 });

    const snapshot = await cache.get('Volkswagen', 'Golf', 2021, 'petrol');

    expect(aggregate).not.toHaveBeenCalled();
    expect(snapshot.fingerprint).toBe('sha256:stored');
  });

  it('raises MarketDataUnavailable when nothing is known', async () => {
    const { aggregator } = aggregatorOf(async () => {
      throw new Error('source_down');
    });
    const cache = new MarketSnapshotCache({ aggregator, ttlMs: 60_000, timeoutMs: 1_000 });

    const failure = cache.get('Volkswagen', 'Golf', 2021, 'petrol');
    await expect(failure).rejects.toBeInstanceOf(MarketDataUnavailable);
    await expect(failure).rejects.toMatchObject({
      code: 'market_data_unavailable',
      details: { key: 'volkswagen|golf|2021|petrol', reason: 'source_down' }
    });
  });

  it('rejects an invalid aggregate', async () => {
    const { aggregator } = aggregatorOf(async () => ({ ...golfStats, avgPrice: -1 }));
    const cache = new MarketSnapshotCache({ aggregator, ttlMs: 60_000, timeoutMs: 1_000 });

    await expect(cache.get('Volkswagen', 'Golf', 2021, 'petrol')).rejects.toMatchObject({
      details: { reason: 'aggregate_payload_invalid' }
    });
  });

  it('aborts an aggregation that exceeds its timeout', async () => {
    let seenSignal: AbortSignal | undefined;
    const { aggregator } = aggregatorOf((_query, options) => {
      seenSignal = options?.signal;
      return new Promise<MarketStats>(() => undefined);
    });
    const cache = new MarketSnapshotCache({ aggregator, ttlMs: 60_000, timeoutMs: 20 });

    await expect(cache.get('Volkswagen', 'Golf', 2021, 'petrol')).rejects.toMatchObject({
      details: { reason: 'market_aggregation_timeout_after_20ms' }
    });
    expect(seenSignal?.aborted).toBe(true);
  });

  it('drops the in-memory entry on invalidate', async () => {
    const { aggregator, aggregate } = aggregatorOf(async () => golfStats);
    const cache = new MarketSnapshotCache({ aggregator, ttlMs: 60_000, timeoutMs: 1_000 });

    await cache.get('Volkswagen', 'Golf', 2021, 'petrol');
    cache.invalidate('volkswagen|golf|2021|petrol');
    expect(cache.peek('volkswagen|golf|2021|petrol')).toBeUndefined();
    await cache.get('Volkswagen', 'Golf', 2021, 'petrol');

    expect(aggregate).toHaveBeenCalledTimes(2);
  });
});
