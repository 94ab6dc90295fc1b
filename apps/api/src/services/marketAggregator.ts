import { z } from 'zod';
import type { MarketQuery, MarketStats } from '../types/domain.js';
import { sameSegment, type Catalog } from './catalog.js';
import { clamp, round2, round4 } from '../utils/money.js';

export type AggregateOptions = {
  signal?: AbortSignal;
};

/** Produces aggregated price statistics for one vehicle segment. */
export type MarketAggregator = {
  aggregate(query: MarketQuery, options?: AggregateOptions): Promise<MarketStats>;
};

export type SourceListingSummary = {
  source: string;
  avgPrice: number;
  minPrice: number;
  maxPrice: number;
  listingCount: number;
  confidence?: number;
};

export type MarketSource = {
  name: string;
  fetchSummary(query: MarketQuery, options?: AggregateOptions): Promise<SourceListingSummary | undefined>;
};

export class MarketSourceError extends Error {
  readonly failures: string[];

  constructor(message: string, failures: string[] = []) {
    super(message);
    this.name = 'MarketSourceError';
    this.failures = failures;
  }
}

const sourceSummarySchema = z.object({
  avgPrice: z.number().finite().positive(),
  minPrice: z.number().finite().nonnegative(),
  maxPrice: z.number().finite().positive(),
  listingCount: z.number().int().nonnegative(),
  confidence: z.number().min(0).max(1).optional()
}).refine((value) => value.minPrice <= value.avgPrice && value.avgPrice <= value.maxPrice, {
  message: 'price_bounds_inconsistent'
});

export const marketStatsSchema = z.object({
  avgPrice: z.number().finite().positive(),
  minPrice: z.number().finite().nonnegative(),
  maxPrice: z.number().finite().positive(),
  listingCount: z.number().int().nonnegative(),
  confidence: z.number().min(0).max(1)
});

function sourceConfidence(respondingSources: number, listingCount: number): number {
  const bySources = 0.3 + respondingSources * 0.15;
  const byListings = listingCount >= 30 ? 0.1 : listingCount >= 10 ? 0.05 : 0;
  return round4(clamp(bySources + byListings, 0, 0.95));
}

/**
 * Combines per-source summaries: the average of source averages, the overall
 * min and max, and the summed listing count.
 */
export function combineSourceSummaries(summaries: SourceListingSummary[]): MarketStats {
  if (summaries.length === 0) {
    throw new MarketSourceError('no_source_summaries');
  }

  const avgPrice = summaries.reduce((sum, item) => sum + item.avgPrice, 0) / summaries.length;
  const listingCount = summaries.reduce((sum, item) => sum + item.listingCount, 0);
  const reported = summaries
    .map((item) => item.confidence)
    .filter((value): value is number => typeof value === 'number');

  const confidence = reported.length === summaries.length
    ? round4(reported.reduce((sum, value) => sum + value, 0) / reported.length)
    : sourceConfidence(summaries.length, listingCount);

  return {
    avgPrice: round2(avgPrice),
    minPrice: round2(Math.min(...summaries.map((item) => item.minPrice))),
    maxPrice: round2(Math.max(...summaries.map((item) => item.maxPrice))),
    listingCount,
    confidence
  };
}

export function createMultiSourceAggregator(sources: MarketSource[]): MarketAggregator {
  return {
    async aggregate(query, options) {
      const failures: string[] = [];

      const settled = await Promise.allSettled(
        sources.map((source) => source.fetchSummary(query, options))
      );

      const summaries: SourceListingSummary[] = [];
      settled.forEach((result, index) => {
        const name = sources[index]?.name ?? `source_${index}`;
        if (result.status === 'rejected') {
          const reason = result.reason instanceof Error ? result.reason.message : 'source_failed';
          failures.push(`${name}:${reason}`);
          return;
        }

        if (result.value) summaries.push(result.value);
      });

      if (options?.signal?.aborted) {
        throw new MarketSourceError('aggregation_aborted', failures);
      }

      if (summaries.length === 0) {
        throw new MarketSourceError('no_market_sources_responded', failures);
      }

      return combineSourceSummaries(summaries);
    }
  };
}

export function createHttpMarketSource(url: string, options: { name?: string; token?: string } = {}): MarketSource {
  const name = options.name ?? new URL(url).hostname;

  return {
    name,
    async fetchSummary(query, requestOptions) {
      const target = new URL(url);
      target.searchParams.set('make', query.make);
      target.searchParams.set('model', query.model);
      target.searchParams.set('year', String(query.year));
      target.searchParams.set('fuel', query.fuel);

      const headers: Record<string, string> = { accept: 'application/json' };
      if (options.token) headers.authorization = `Bearer ${options.token}`;

      const response = await fetch(target, {
        method: 'GET',
        headers,
        signal: requestOptions?.signal
      });

      if (response.status === 404) return undefined;
      if (!response.ok) {
        throw new MarketSourceError(`http_${response.status}`);
      }

      const payload: unknown = await response.json().catch(() => undefined);
      const parsed = sourceSummarySchema.safeParse(payload);
      if (!parsed.success) {
        throw new MarketSourceError('invalid_payload');
      }

      return { source: name, ...parsed.data };
    }
  };
}

/** Summarizes comparable vehicles in the dealer's own inventory. */
export function createCatalogMarketSource(catalog: Catalog): MarketSource {
  return {
    name: 'catalog',
    async fetchSummary(query) {
      const prices = catalog
        .listVehicles()
        .filter((vehicle) => sameSegment(vehicle, query))
        .map((vehicle) => vehicle.marketValue)
        .filter((price) => price > 0);

      if (prices.length === 0) return undefined;

      return {
        source: 'catalog',
        avgPrice: round2(prices.reduce((sum, price) => sum + price, 0) / prices.length),
        minPrice: round2(Math.min(...prices)),
        maxPrice: round2(Math.max(...prices)),
        listingCount: prices.length,
        confidence: round4(clamp(prices.length / 10, 0.2, 0.9))
      };
    }
  };
}
