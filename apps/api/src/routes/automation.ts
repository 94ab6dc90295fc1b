import type { FastifyInstance } from 'fastify';
import { requireRole } from '../services/access.js';
import { automationStatus, runExpiryAutomationTick } from '../services/automation.js';
import type { NegotiationOrchestrator } from '../services/orchestrator.js';
import type { Store } from '../services/store.js';

export function registerAutomationRoutes(app: FastifyInstance, store: Store, orchestrator: NegotiationOrchestrator) {
  app.get('/automation/status', async (req, reply) => {
    if (!requireRole(req, reply, 'readonly')) return;

    return {
      ok: true,
      ...automationStatus(store)
    };
  });

  app.post('/automation/tick', async (req, reply) => {
    if (!requireRole(req, reply, 'operator')) return;

    const summary = await runExpiryAutomationTick(orchestrator);
    if (summary.expired > 0) {
      req.log.info({ summary }, 'expiry_automation_manual_tick');
    }

    return {
      ok: true,
      summary
    };
  });
}
