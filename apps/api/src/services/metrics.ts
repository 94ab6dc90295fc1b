import type { NegotiationOutcomeReason } from '../types/domain.js';

export interface Metric {
  route: string;
  method: string;
  statusCode: number;
  durationMs: number;
  timestamp: number;
}

export type CacheEvent = 'hit' | 'miss' | 'degraded' | 'coalesced';

export type AgentEvent = 'success' | 'retry' | 'failure';

const WINDOW_MS = 5 * 60 * 1000;

class MetricsService {
  private metrics: Metric[] = [];
  private maxMetrics = 1000;
  private outcomes = new Map<NegotiationOutcomeReason, number>();
  private cache = new Map<CacheEvent, number>();
  private agents = new Map<string, number>();
  private roundsExecuted = 0;

  observe(data: Omit<Metric, 'timestamp'>): void {
    this.metrics.push({ ...data, timestamp: Date.now() });

    if (this.metrics.length > this.maxMetrics) {
      this.metrics = this.metrics.slice(-this.maxMetrics);
    }
  }

  recordOutcome(reason: NegotiationOutcomeReason): void {
    this.outcomes.set(reason, (this.outcomes.get(reason) ?? 0) + 1);
  }

  recordCache(event: CacheEvent): void {
    this.cache.set(event, (this.cache.get(event) ?? 0) + 1);
  }

  recordAgent(role: string, event: AgentEvent): void {
    const key = `${role}:${event}`;
    this.agents.set(key, (this.agents.get(key) ?? 0) + 1);
  }

  recordRound(): void {
    this.roundsExecuted += 1;
  }

  snapshot() {
    const now = Date.now();
    const recent = this.metrics.filter((m) => now - m.timestamp < WINDOW_MS);

    const byRoute = new Map<string, { count: number; totalDuration: number; errors: number }>();

    for (const m of recent) {
      const key = `${m.method} ${m.route}`;
      const existing = byRoute.get(key) || { count: 0, totalDuration: 0, errors: 0 };
      existing.count++;
      existing.totalDuration += m.durationMs;
      if (m.statusCode >= 400) existing.errors++;
      byRoute.set(key, existing);
    }

    const routes: Record<string, { count: number; avgDurationMs: number; errorRate: number }> = {};
    for (const [key, val] of byRoute) {
      routes[key] = {
        count: val.count,
        avgDurationMs: val.totalDuration / val.count,
        errorRate: val.errors / val.count
      };
    }

    return {
      totalRequests: recent.length,
      routes,
      windowMs: WINDOW_MS,
      negotiations: {
        roundsExecuted: this.roundsExecuted,
        outcomes: Object.fromEntries(this.outcomes)
      },
      marketCache: Object.fromEntries(this.cache),
      agents: Object.fromEntries(this.agents)
    };
  }

  reset(): void {
    this.metrics = [];
    this.outcomes.clear();
    this.cache.clear();
    this.agents.clear();
    this.roundsExecuted = 0;
  }
}

export const metrics = new MetricsService();
