import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { NegotiationStatus } from '../types/domain.js';
import { requireRole } from '../services/access.js';
import { sendError } from '../services/errors.js';
import type { NegotiationOrchestrator } from '../services/orchestrator.js';
import type { Store } from '../services/store.js';

const NEGOTIATION_STATUSES: NegotiationStatus[] = [
  'initiated',
  'in_progress',
  'pending_approval',
  'concluded',
  'failed'
];

const marketParamsSchema = z.object({
  make: z.string().min(1).max(80),
  model: z.string().min(1).max(80),
  year: z.coerce.number().int().min(1950).max(2100),
  fuel: z.string().min(1).max(40)
});

function isNegotiationStatus(value: string): value is NegotiationStatus {
  return NEGOTIATION_STATUSES.some((status) => status === value);
}

export function registerReadRoutes(app: FastifyInstance, store: Store, orchestrator: NegotiationOrchestrator) {
  app.get('/api/negotiations', async (req, reply) => {
    if (!requireRole(req, reply, 'readonly')) return;

    const statusRaw = (req.query as { status?: string }).status;
    if (statusRaw && !isNegotiationStatus(statusRaw)) {
      return sendError(reply, 400, 'invalid_request', 'Unknown negotiation status', {
        status: statusRaw,
        allowed: NEGOTIATION_STATUSES
      });
    }

    return {
      ok: true,
      negotiations: orchestrator.listNegotiations(statusRaw && isNegotiationStatus(statusRaw) ? statusRaw : undefined)
    };
  });

  app.get('/api/vehicles', async (req, reply) => {
    if (!requireRole(req, reply, 'readonly')) return;

    const inStockRaw = String((req.query as { inStock?: string }).inStock || '').toLowerCase();
    const inStock = inStockRaw === 'true' ? true : inStockRaw === 'false' ? false : undefined;

    return {
      ok: true,
      vehicles: store.listVehicles(inStock === undefined ? undefined : { inStock })
    };
  });

  app.get('/api/clients', async (req, reply) => {
    if (!requireRole(req, reply, 'readonly')) return;

    return {
      ok: true,
      clients: store.listClients()
    };
  });

  app.get('/api/market/:make/:model/:year/:fuel', async (req, reply) => {
    if (!requireRole(req, reply, 'readonly')) return;

    const params = marketParamsSchema.safeParse(req.params);
    if (!params.success) {
      return sendError(reply, 400, 'invalid_request', 'Invalid market segment', {
        issues: params.error.flatten()
      });
    }

    const { make, model, year, fuel } = params.data;
    return {
      ok: true,
      snapshot: await orchestrator.marketSnapshot(make, model, year, fuel)
    };
  });
}
