import retry from 'async-retry';
import { z } from 'zod';
import type { ClientRecord, OfferTerms, RecommendedAction, VehicleRecord } from '../types/domain.js';
import { AgentFailure } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { metrics } from './metrics.js';
import { agentBackoffMsByDefault, agentMaxAttemptsByDefault, agentTimeoutMsByDefault } from './policy.js';
import { costBasisOf, meetsMargin, withinBudget } from './pricing.js';
import {
  ReasoningBackendError,
  type AgentContextByRole,
  type AgentRole,
  type MarketAnalysisContext,
  type NegotiationContext,
  type OfferStructuringContext,
  type ReasoningBackend,
  type ReasoningFailureKind,
  type TradeInEvaluationContext
} from './reasoningBackend.js';
import { TimeoutError, withTimeout } from '../utils/async.js';

const benefitsSchema = z.object({
  warrantyMonths: z.number().int().min(0).max(120),
  maintenanceIncluded: z.boolean(),
  roadsideAssistance: z.boolean(),
  insuranceIncluded: z.boolean()
});

export const offerTermsSchema = z.object({
  offerType: z.enum(['purchase', 'lease', 'subscription']),
  tradeInValue: z.number().finite().nonnegative(),
  purchasePrice: z.number().finite().positive().optional(),
  monthlyPayment: z.number().finite().positive().optional(),
  durationMonths: z.number().int().min(1).max(120).optional(),
  benefits: benefitsSchema,
  confidence: z.number().min(0).max(1),
  justification: z.string().min(1).max(4_000),
  concession: z.boolean(),
  budgetConflict: z.boolean()
}).superRefine((value, ctx) => {
  if (value.offerType === 'purchase' && value.purchasePrice == null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'purchase_price_required', path: ['purchasePrice'] });
  }

  if (value.offerType !== 'purchase' && (value.monthlyPayment == null || value.durationMonths == null)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'monthly_terms_required', path: ['monthlyPayment'] });
  }
});

const marketAnalysisSchema = z.object({
  demandLevel: z.enum(['high', 'medium', 'low']),
  pricingPosition: z.enum(['above', 'at', 'below']),
  competitiveFactors: z.array(z.string().min(1).max(500)).max(20),
  recommendedStrategy: z.enum(['premium', 'balanced', 'aggressive']),
  riskFactors: z.array(z.string().min(1).max(500)).max(20)
});

const tradeInEvaluationSchema = z.object({
  baseValue: z.number().finite().nonnegative(),
  conditionAdjustment: z.number().finite(),
  loyaltyBonus: z.number().finite().nonnegative(),
  finalValue: z.number().finite().nonnegative(),
  confidence: z.number().min(0).max(1),
  justification: z.string().min(1).max(4_000)
});

const offerStructuringSchema = z.object({
  offers: z.array(offerTermsSchema).min(1).max(3)
});

const negotiationSchema = z.object({
  revisedOffer: offerTermsSchema.optional(),
  acceptanceLikelihood: z.number().min(0).max(1),
  reasoning: z.string().min(1).max(20_000),
  recommendedAction: z.enum(['accept', 'adjust', 'hold_firm', 'close'])
});

export type MarketAnalysisResult = z.infer<typeof marketAnalysisSchema>;
export type TradeInEvaluationResult = z.infer<typeof tradeInEvaluationSchema>;
export type OfferStructuringResult = { offers: OfferTerms[] };
export type NegotiationAgentResult = {
  revisedOffer?: OfferTerms;
  acceptanceLikelihood: number;
  reasoning: string;
  recommendedAction: RecommendedAction;
};

function malformed(role: AgentRole, reason: string): ReasoningBackendError {
  return new ReasoningBackendError('malformed_output', `${role}:${reason}`);
}

function parseWith<T>(role: AgentRole, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') || 'root';
    throw malformed(role, `schema_invalid:${path}:${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/** Margin and budget claims an offer makes must match its numbers. */
export function offerTermsViolation(
  terms: OfferTerms,
  vehicle: VehicleRecord,
  client: ClientRecord,
  marginTarget: number
): string | undefined {
  if (!terms.concession && !meetsMargin(terms, costBasisOf(vehicle), marginTarget)) {
    return 'margin_below_target_without_concession';
  }

  if (!terms.budgetConflict && !withinBudget(terms, client)) {
    return 'outside_budget_without_conflict_flag';
  }

  return undefined;
}

function failureKind(error: unknown): ReasoningFailureKind {
  if (error instanceof ReasoningBackendError) return error.kind;
  if (error instanceof TimeoutError) return 'timeout';
  return 'backend_unavailable';
}

function failureReason(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown_failure';
}

export type AgentPipelineOptions = {
  backend: ReasoningBackend;
  logger?: Logger;
  timeoutMs?: number;
  maxAttempts?: number;
  backoffMs?: number;
};

/**
 * The four agent roles behind one call path. Every call is bounded by a
 * timeout and retried with exponential backoff; an output is returned only
 * once it has passed its schema and cross-field checks.
 */
export class AgentPipeline {
  private readonly backend: ReasoningBackend;
  private readonly logger: Logger;
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly backoffMs: number;

  constructor(options: AgentPipelineOptions) {
    this.backend = options.backend;
    this.logger = options.logger ?? silentLogger();
    this.timeoutMs = options.timeoutMs ?? agentTimeoutMsByDefault();
    this.maxAttempts = Math.max(1, options.maxAttempts ?? agentMaxAttemptsByDefault());
    this.backoffMs = Math.max(0, options.backoffMs ?? agentBackoffMsByDefault());
  }

  get backendName(): string {
    return this.backend.name;
  }

  marketAnalysis(context: MarketAnalysisContext): Promise<MarketAnalysisResult> {
    return this.invoke('market_analysis', context, (raw) => parseWith('market_analysis', marketAnalysisSchema, raw));
  }

  tradeInEvaluation(context: TradeInEvaluationContext): Promise<TradeInEvaluationResult> {
    return this.invoke('trade_in_evaluation', context, (raw) => {
      const result = parseWith('trade_in_evaluation', tradeInEvaluationSchema, raw);
      const expected = Math.max(0, result.baseValue + result.conditionAdjustment + result.loyaltyBonus);
      if (Math.abs(result.finalValue - expected) > 0.01) {
        throw malformed('trade_in_evaluation', 'final_value_mismatch');
      }
      return result;
    });
  }

  offerStructuring(context: OfferStructuringContext): Promise<OfferStructuringResult> {
    return this.invoke('offer_structuring', context, (raw) => {
      const result = parseWith('offer_structuring', offerStructuringSchema, raw);
      for (const offer of result.offers) {
        const violation = offerTermsViolation(offer, context.vehicle, context.client, context.marginTarget);
        if (violation) throw malformed('offer_structuring', violation);
      }
      return result;
    });
  }

  negotiation(context: NegotiationContext): Promise<NegotiationAgentResult> {
    return this.invoke('negotiation', context, (raw) => {
      const result = parseWith('negotiation', negotiationSchema, raw);
      if (result.revisedOffer) {
        const violation = offerTermsViolation(result.revisedOffer, context.vehicle, context.client, context.marginTarget);
        if (violation) throw malformed('negotiation', violation);
      }
      return result;
    });
  }

  private async invoke<R extends AgentRole, T>(
    role: R,
    context: AgentContextByRole[R],
    parse: (raw: unknown) => T
  ): Promise<T> {
    try {
      return await retry(
        async (_bail, attempt) => {
          const raw = await withTimeout(`agent_${role}`, this.timeoutMs, (signal) =>
            this.backend.invoke(role, context, { signal })
          );
          const result = parse(raw);
          metrics.recordAgent(role, 'success');
          this.logger.debug({ role, attempt, backend: this.backend.name }, 'agent_call_succeeded');
          return result;
        },
        {
          retries: this.maxAttempts - 1,
          factor: 2,
          minTimeout: this.backoffMs,
          randomize: false,
          onRetry: (error, attempt) => {
            metrics.recordAgent(role, 'retry');
            this.logger.warn({ role, attempt, kind: failureKind(error), reason: failureReason(error) }, 'agent_attempt_failed');
          }
        }
      );
    } catch (error) {
      const lastFailure = failureKind(error);
      const reason = failureReason(error);
      metrics.recordAgent(role, 'failure');
      this.logger.error({ role, attempts: this.maxAttempts, kind: lastFailure, reason }, 'agent_failed');
      throw new AgentFailure(`Agent ${role} failed after ${this.maxAttempts} attempts`, {
        role,
        attempts: this.maxAttempts,
        lastFailure,
        reason
      });
    }
  }
}
