import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import rateLimit from '@fastify/rate-limit';
import { registerAutomationRoutes } from './routes/automation.js';
import { registerNegotiationRoutes } from './routes/negotiations.js';
import { registerReadRoutes } from './routes/read.js';
import { registerSystemRoutes } from './routes/system.js';
import { AgentPipeline, type AgentPipelineOptions } from './services/agentPipeline.js';
import { expiryAutomationConfig, runExpiryAutomationTick } from './services/automation.js';
import { NegotiationError, sendError, sendNegotiationError } from './services/errors.js';
import {
  createCatalogMarketSource,
  createHttpMarketSource,
  createMultiSourceAggregator,
  type MarketAggregator
} from './services/marketAggregator.js';
import { MarketSnapshotCache } from './services/marketCache.js';
import { metrics } from './services/metrics.js';
import { NegotiationOrchestrator, type OrchestratorOptions } from './services/orchestrator.js';
import { marketSourceUrlsByDefault, reasoningBackendTokenByDefault, reasoningBackendUrlByDefault } from './services/policy.js';
import { createHttpReasoningBackend, type ReasoningBackend } from './services/reasoningBackend.js';
import { createRulesBackend } from './services/rulesBackend.js';
import { createStore, type Store } from './services/store.js';

export type ServerOptions = {
  dbFile?: string;
  logger?: boolean;
  store?: Store;
  aggregator?: MarketAggregator;
  backend?: ReasoningBackend;
  agent?: Pick<AgentPipelineOptions, 'timeoutMs' | 'maxAttempts' | 'backoffMs'>;
  negotiation?: Omit<OrchestratorOptions, 'store' | 'cache' | 'pipeline' | 'logger'>;
  marketSnapshotTtlMs?: number;
};

function defaultAggregator(store: Store): MarketAggregator {
  const token = process.env.NEG_MARKET_SOURCE_TOKEN?.trim() || undefined;
  return createMultiSourceAggregator([
    ...marketSourceUrlsByDefault().map((url) => createHttpMarketSource(url, { token })),
    createCatalogMarketSource(store)
  ]);
}

function defaultBackend(): ReasoningBackend {
  const baseUrl = reasoningBackendUrlByDefault();
  return baseUrl
    ? createHttpReasoningBackend({ baseUrl, token: reasoningBackendTokenByDefault() })
    : createRulesBackend();
}

export function buildServer(options: ServerOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: options.logger ?? true,
    genReqId: () => `req_${Date.now()}_${Math.random().toString(36).slice(2, 9)}`
  });

  const store = options.store || createStore({ dbFile: options.dbFile });

  const cache = new MarketSnapshotCache({
    aggregator: options.aggregator ?? defaultAggregator(store),
    repository: store,
    ttlMs: options.marketSnapshotTtlMs,
    logger: app.log
  });

  const pipeline = new AgentPipeline({
    backend: options.backend ?? defaultBackend(),
    logger: app.log,
    ...options.agent
  });

  const orchestrator = new NegotiationOrchestrator({
    ...options.negotiation,
    store,
    cache,
    pipeline,
    logger: app.log
  });

  app.register(cors, {
    origin: true,
    credentials: true
  });

  app.register(rateLimit, {
    max: Number(process.env.NEG_RATE_LIMIT_MAX || 120),
    timeWindow: process.env.NEG_RATE_LIMIT_WINDOW || '1 minute',
    keyGenerator: (request) => {
      return request.headers.authorization || request.ip || 'unknown';
    }
  });

  app.register(swagger, {
    openapi: {
      info: {
        title: 'AutoTrade Negotiation API',
        version: '0.1.0',
        description: 'Vehicle trade-in and purchase negotiation orchestrated by reasoning agents'
      },
      servers: [{ url: 'http://localhost:3000', description: 'Local development' }]
    }
  });

  app.register(swaggerUI, {
    routePrefix: '/docs'
  });

  app.addHook('onRequest', async (req) => {
    (req as typeof req & { _startedAt?: number })._startedAt = Date.now();
  });

  app.addHook('onResponse', async (req, reply) => {
    const startedAt = (req as typeof req & { _startedAt?: number })._startedAt || Date.now();

    metrics.observe({
      route: req.routeOptions?.url || req.url,
      method: req.method,
      statusCode: reply.statusCode,
      durationMs: Date.now() - startedAt
    });
  });

  registerSystemRoutes(app, store);
  registerNegotiationRoutes(app, orchestrator);
  registerReadRoutes(app, store, orchestrator);
  registerAutomationRoutes(app, store, orchestrator);

  let automationTimer: ReturnType<typeof setInterval> | undefined;
  const automation = expiryAutomationConfig();

  if (automation.enabled) {
    automationTimer = setInterval(() => {
      runExpiryAutomationTick(orchestrator)
        .then((summary) => {
          if (summary.expired > 0) {
            app.log.info({ summary }, 'expiry_automation_tick');
          }
        })
        .catch((error: unknown) => {
          app.log.error({ err: error }, 'expiry_automation_tick_failed');
        });
    }, automation.intervalMs);

    automationTimer.unref?.();
  }

  app.setNotFoundHandler((_req, reply) => {
    sendError(reply, 404, 'not_found', 'Route not found');
  });

  app.setErrorHandler<FastifyError>((error, req, reply) => {
    if (reply.sent) return;

    if (error instanceof NegotiationError) {
      req.log.warn({ code: error.code, details: error.details }, 'negotiation_request_failed');
      sendNegotiationError(reply, error);
      return;
    }

    if (error.statusCode === 429) {
      sendError(reply, 429, 'rate_limited', 'Too many requests');
      return;
    }

    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      sendError(reply, error.statusCode, 'invalid_request', error.message);
      return;
    }

    app.log.error({ err: error }, 'unhandled_error');
    sendError(reply, 500, 'internal_error', 'Internal server error');
  });

  app.addHook('onClose', async () => {
    if (automationTimer) {
      clearInterval(automationTimer);
    }
    store.close();
  });

  return app;
}
