import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { requireRole } from '../services/access.js';
import { sendError } from '../services/errors.js';
import type { NegotiationOrchestrator } from '../services/orchestrator.js';

const idParamSchema = z.object({
  id: z.string().min(1)
});

const createSchema = z.object({
  clientId: z.string().min(1),
  tradeInVehicleId: z.string().min(1).optional(),
  targetVehicleId: z.string().min(1).optional(),
  marginTarget: z.number().min(0).lt(1).optional(),
  maxRounds: z.number().int().min(1).max(50).optional()
});

const counterProposalSchema = z.object({
  price: z.number().finite().positive().optional(),
  monthlyPayment: z.number().finite().positive().optional(),
  durationMonths: z.number().int().min(1).max(120).optional(),
  tradeInValue: z.number().finite().nonnegative().optional()
});

const roundSchema = z.object({
  feedback: z.string().max(10_000).default(''),
  counterProposal: counterProposalSchema.optional()
}).refine((value) => value.feedback.trim() !== '' || value.counterProposal !== undefined, {
  message: 'feedback or counterProposal is required'
});

const abandonSchema = z.object({
  reason: z.string().max(500).optional()
});

export function registerNegotiationRoutes(app: FastifyInstance, orchestrator: NegotiationOrchestrator) {
  app.post('/api/negotiations', async (req, reply) => {
    if (!requireRole(req, reply, 'operator')) return;

    const parsed = createSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendError(reply, 400, 'invalid_request', 'Invalid negotiation request', {
        issues: parsed.error.flatten()
      });
    }

    const details = await orchestrator.initiate(parsed.data);
    req.log.info({ negotiationId: details.negotiation.id }, 'negotiation_created');

    return reply.code(201).send({
      ok: true,
      ...details
    });
  });

  app.post('/api/negotiations/:id/rounds', async (req, reply) => {
    if (!requireRole(req, reply, 'operator')) return;

    const params = idParamSchema.safeParse(req.params);
    if (!params.success) {
      return sendError(reply, 400, 'invalid_request', 'Negotiation id is required');
    }

    const parsed = roundSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendError(reply, 400, 'invalid_request', 'Invalid round request', {
        issues: parsed.error.flatten()
      });
    }

    const outcome = await orchestrator.executeRound(params.data.id, parsed.data.feedback, parsed.data.counterProposal);
    return {
      ok: true,
      ...outcome
    };
  });

  app.post('/api/negotiations/:id/abandon', async (req, reply) => {
    if (!requireRole(req, reply, 'operator')) return;

    const params = idParamSchema.safeParse(req.params);
    const parsed = abandonSchema.safeParse(req.body ?? {});
    if (!params.success || !parsed.success) {
      return sendError(reply, 400, 'invalid_request', 'Invalid abandon request');
    }

    const negotiation = await orchestrator.abandon(params.data.id, parsed.data.reason);
    return {
      ok: true,
      negotiation
    };
  });

  app.get('/api/negotiations/:id', async (req, reply) => {
    if (!requireRole(req, reply, 'readonly')) return;

    const params = idParamSchema.safeParse(req.params);
    if (!params.success) {
      return sendError(reply, 400, 'invalid_request', 'Negotiation id is required');
    }

    return {
      ok: true,
      ...orchestrator.getDetails(params.data.id)
    };
  });

  app.get('/api/negotiations/:id/history', async (req, reply) => {
    if (!requireRole(req, reply, 'readonly')) return;

    const params = idParamSchema.safeParse(req.params);
    if (!params.success) {
      return sendError(reply, 400, 'invalid_request', 'Negotiation id is required');
    }

    return {
      ok: true,
      negotiationId: params.data.id,
      rounds: orchestrator.getHistory(params.data.id)
    };
  });

  app.get('/api/negotiations/:id/analysis', async (req, reply) => {
    if (!requireRole(req, reply, 'readonly')) return;

    const params = idParamSchema.safeParse(req.params);
    if (!params.success) {
      return sendError(reply, 400, 'invalid_request', 'Negotiation id is required');
    }

    return {
      ok: true,
      analysis: orchestrator.getAnalysis(params.data.id)
    };
  });

  app.post('/api/offers/:id/accept', async (req, reply) => {
    if (!requireRole(req, reply, 'operator')) return;

    const params = idParamSchema.safeParse(req.params);
    if (!params.success) {
      return sendError(reply, 400, 'invalid_request', 'Offer id is required');
    }

    const result = await orchestrator.acceptOffer(params.data.id);
    return {
      ok: true,
      ...result
    };
  });

  app.post('/api/offers/:id/reject', async (req, reply) => {
    if (!requireRole(req, reply, 'operator')) return;

    const params = idParamSchema.safeParse(req.params);
    if (!params.success) {
      return sendError(reply, 400, 'invalid_request', 'Offer id is required');
    }

    const result = await orchestrator.rejectOffer(params.data.id);
    return {
      ok: true,
      ...result
    };
  });
}
