import type { FastifyInstance } from 'fastify';
import { authSummary, requireRole } from '../services/access.js';
import { metrics } from '../services/metrics.js';
import { policySnapshot } from '../services/policy.js';
import type { Store } from '../services/store.js';

export function registerSystemRoutes(app: FastifyInstance, store: Store) {
  const startedAt = Date.now();

  app.get('/health', async () => {
    return {
      ok: true,
      service: 'autotrade-negotiation-api',
      version: '0.1.0',
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
      dbFile: store.file,
      counts: store.counts(),
      now: new Date().toISOString()
    };
  });

  app.get('/metrics', async () => {
    return {
      ok: true,
      metrics: metrics.snapshot(),
      store: store.stats()
    };
  });

  app.get('/auth/status', async () => {
    return {
      ok: true,
      config: authSummary()
    };
  });

  app.get('/policy', async (req, reply) => {
    if (!requireRole(req, reply, 'readonly')) return;

    return {
      ok: true,
      policy: policySnapshot()
    };
  });
}
