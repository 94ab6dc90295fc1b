import type {
  ClientRecord,
  CounterProposal,
  MarketSnapshot,
  NegotiationDetails,
  NegotiationRecord,
  NegotiationRoundRecord,
  NegotiationStatus,
  OfferRecord,
  OfferTerms,
  ReasoningTraceEntry,
  RoundDecision,
  VehicleRecord
} from '../types/domain.js';
import type { AgentPipeline, TradeInEvaluationResult } from './agentPipeline.js';
import { findSuitableVehicle } from './catalog.js';
import {
  ConcurrencyConflict,
  InvalidTransitionError,
  NotFoundError,
  ValidationError
} from './errors.js';
import { KeyedLock } from './keyedLock.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { MarketSnapshotCache } from './marketCache.js';
import { metrics } from './metrics.js';
import {
  assessFeedback,
  clientExpectation,
  decideRound,
  finalEffortTerms,
  type AcceptancePolicy
} from './negotiationSession.js';
import { OfferBook } from './offerBook.js';
import {
  acceptanceGapScaleByDefault,
  acceptanceThresholdByDefault,
  marginTargetByDefault,
  maxRoundsByDefault,
  sessionTimeoutMsByDefault
} from './policy.js';
import { costBasisOf, effectivePrice, marginOf, offerTermsOf } from './pricing.js';
import { acceptsRounds, allowedNextStates, canTransitionNegotiation, isTerminal } from './sessionState.js';
import type { Store } from './store.js';
import { generateNegotiationId, generateRoundId } from '../utils/ids.js';
import { round2 } from '../utils/money.js';
import { addMs, isPast, nowIso } from '../utils/time.js';

export type OrchestratorOptions = {
  store: Store;
  cache: MarketSnapshotCache;
  pipeline: AgentPipeline;
  logger?: Logger;
  maxRounds?: number;
  sessionTimeoutMs?: number;
  marginTarget?: number;
  acceptanceThreshold?: number;
  acceptanceGapScale?: number;
};

export type InitiateInput = {
  clientId: string;
  tradeInVehicleId?: string;
  targetVehicleId?: string;
  marginTarget?: number;
  maxRounds?: number;
};

export type RoundOutcome = {
  negotiation: NegotiationRecord;
  decision: RoundDecision | 'timeout';
  round?: NegotiationRoundRecord;
  activeOffer?: OfferRecord;
};

export type OfferActionResult = {
  negotiation: NegotiationRecord;
  offer: OfferRecord;
};

export type NegotiationAnalysis = {
  negotiationId: string;
  status: NegotiationStatus;
  outcomeReason?: NegotiationRecord['outcomeReason'];
  roundsExecuted: number;
  maxRounds: number;
  tradeInValue?: number;
  finalPrice?: number;
  marginAchieved?: number;
  marginTarget: number;
  chosenOfferType?: NegotiationRecord['chosenOfferType'];
  marketAnalysis: Record<string, unknown>;
  marketDataDegraded: boolean;
  reasoningTrace: ReasoningTraceEntry[];
  durationMinutes: number;
  offerCount: number;
  activeOfferId?: string;
};

function traceEntry(stage: string, summary: string, data?: Record<string, unknown>): ReasoningTraceEntry {
  return { stage, summary, at: nowIso(), ...(data ? { data } : {}) };
}

function choosePrimaryOffer(offers: OfferTerms[], preference: ClientRecord['offerPreference']): OfferTerms | undefined {
  const preferred = preference === 'flexible' ? offers : offers.filter((offer) => offer.offerType === preference);
  const pool = preferred.length > 0 ? preferred : offers;

  return [...pool].sort((a, b) =>
    Number(a.budgetConflict) - Number(b.budgetConflict) ||
    Number(a.concession) - Number(b.concession) ||
    b.confidence - a.confidence
  )[0];
}

function positiveOrUndefined(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isFinite(value) || value <= 0)) {
    throw new ValidationError(`${name} must be a positive number`, { field: name, value });
  }
}

/**
 * Entry point for every negotiation operation. Mutations of one negotiation
 * are serialized; each round commits its offer and round record together or
 * not at all.
 */
export class NegotiationOrchestrator {
  private readonly store: Store;
  private readonly cache: MarketSnapshotCache;
  private readonly pipeline: AgentPipeline;
  private readonly logger: Logger;
  private readonly offers: OfferBook;
  private readonly locks = new KeyedLock();
  private readonly maxRounds: number;
  private readonly sessionTimeoutMs: number;
  private readonly marginTarget: number;
  private readonly acceptance: AcceptancePolicy;

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.pipeline = options.pipeline;
    this.logger = options.logger ?? silentLogger();
    this.offers = new OfferBook(options.store);
    this.maxRounds = options.maxRounds ?? maxRoundsByDefault();
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? sessionTimeoutMsByDefault();
    this.marginTarget = options.marginTarget ?? marginTargetByDefault();
    this.acceptance = {
      threshold: options.acceptanceThreshold ?? acceptanceThresholdByDefault(),
      gapScale: options.acceptanceGapScale ?? acceptanceGapScaleByDefault()
    };
  }

  async initiate(input: InitiateInput): Promise<NegotiationDetails> {
    const marginTarget = input.marginTarget ?? this.marginTarget;
    if (!Number.isFinite(marginTarget) || marginTarget < 0 || marginTarget >= 1) {
      throw new ValidationError('marginTarget must be within [0, 1)', { marginTarget });
    }

    const maxRounds = input.maxRounds ?? this.maxRounds;
    if (!Number.isInteger(maxRounds) || maxRounds < 1 || maxRounds > 50) {
      throw new ValidationError('maxRounds must be an integer within [1, 50]', { maxRounds });
    }

    const client = this.store.getClient(input.clientId);
    if (!client) throw new ValidationError('Unknown client', { clientId: input.clientId });

    const tradeIn = input.tradeInVehicleId ? this.store.getVehicle(input.tradeInVehicleId) : undefined;
    if (input.tradeInVehicleId && !tradeIn) {
      throw new ValidationError('Unknown trade-in vehicle', { tradeInVehicleId: input.tradeInVehicleId });
    }

    const target = this.resolveTarget(client, input.targetVehicleId);
    if (tradeIn && tradeIn.id === target.id) {
      throw new ValidationError('Trade-in and target vehicle must differ', { vehicleId: target.id });
    }

    const targetSnapshot = await this.snapshotFor(target);
    const tradeInSnapshot = tradeIn ? await this.snapshotFor(tradeIn) : undefined;

    const marketAnalysis = await this.pipeline.marketAnalysis({ vehicle: target, snapshot: targetSnapshot });

    let tradeInEvaluation: TradeInEvaluationResult | undefined;
    if (tradeIn && tradeInSnapshot) {
      tradeInEvaluation = await this.pipeline.tradeInEvaluation({ vehicle: tradeIn, snapshot: tradeInSnapshot, client });
    }

    const tradeInValue = tradeInEvaluation?.finalValue ?? 0;
    const structured = await this.pipeline.offerStructuring({
      client,
      vehicle: target,
      snapshot: targetSnapshot,
      marketAnalysis,
      tradeInValue,
      marginTarget
    });

    const primary = choosePrimaryOffer(structured.offers, client.offerPreference);
    if (!primary) {
      throw new ValidationError('No offer could be structured', { clientId: client.id });
    }

    const degraded = targetSnapshot.degraded || Boolean(tradeInSnapshot?.degraded);
    const startedAt = nowIso();
    const id = generateNegotiationId();

    const trace: ReasoningTraceEntry[] = [
      traceEntry('market_analysis', `${marketAnalysis.demandLevel} demand, priced ${marketAnalysis.pricingPosition} market`, {
        snapshotKey: targetSnapshot.key,
        fingerprint: targetSnapshot.fingerprint,
        degraded: targetSnapshot.degraded,
        strategy: marketAnalysis.recommendedStrategy
      })
    ];
    if (tradeInEvaluation) {
      trace.push(traceEntry('trade_in_evaluation', `Trade-in valued at ${tradeInEvaluation.finalValue}`, {
        confidence: tradeInEvaluation.confidence
      }));
    }
    trace.push(traceEntry('offer_structuring', `${structured.offers.length} offer(s) structured; opening with ${primary.offerType}`, {
      effectivePrice: effectivePrice(primary)
    }));

    this.store.transaction(() => {
      this.store.insertNegotiation({
        id,
        status: 'initiated',
        clientId: client.id,
        tradeInVehicleId: tradeIn?.id,
        targetVehicleId: target.id,
        marginTarget,
        roundCount: 0,
        maxRounds,
        reasoningTrace: trace,
        marketSnapshotKey: targetSnapshot.key,
        marketDataDegraded: degraded,
        marketAnalysis,
        tradeInEvaluation,
        tradeInOfferedValue: tradeInEvaluation ? tradeInValue : undefined,
        offerAlternatives: structured.offers.filter((offer) => offer !== primary),
        startedAt,
        deadlineAt: addMs(startedAt, this.sessionTimeoutMs),
        updatedAt: startedAt
      });

      this.offers.propose(id, primary, { roundNumber: 0 });
      this.transition(id, 'initiated', 'in_progress');
    });

    this.logger.info(
      { negotiationId: id, clientId: client.id, targetVehicleId: target.id, degraded, offerType: primary.offerType },
      'negotiation_initiated'
    );

    return this.getDetails(id);
  }

  async executeRound(negotiationId: string, feedback: string, counterProposal?: CounterProposal): Promise<RoundOutcome> {
    if (typeof feedback !== 'string' || (feedback.trim() === '' && !counterProposal)) {
      throw new ValidationError('Feedback text or a counter-proposal is required', { negotiationId });
    }
    positiveOrUndefined('price', counterProposal?.price);
    positiveOrUndefined('monthlyPayment', counterProposal?.monthlyPayment);
    positiveOrUndefined('durationMonths', counterProposal?.durationMonths);

    return this.locks.run<RoundOutcome>(negotiationId, async () => {
      const current = this.requireMutable(negotiationId);
      if (isPast(current.deadlineAt)) {
        return { negotiation: this.failForTimeout(current), decision: 'timeout' };
      }

      if (!acceptsRounds(current.status) || current.roundCount >= current.maxRounds) {
        throw new InvalidTransitionError('Negotiation does not accept rounds', {
          negotiationId,
          status: current.status,
          roundCount: current.roundCount
        });
      }

      const reference = this.referenceOffer(negotiationId);
      const activeBefore = this.offers.active(negotiationId);
      const roundNumber = current.roundCount + 1;
      const client = this.requireClient(current.clientId);
      const vehicle = this.requireVehicle(current.targetVehicleId);
      const expectation = clientExpectation(reference, feedback, counterProposal);

      const agent = await this.pipeline.negotiation({
        negotiationId,
        roundNumber,
        maxRounds: current.maxRounds,
        client,
        vehicle,
        marginTarget: current.marginTarget,
        history: this.store.listRounds(negotiationId),
        latestOffer: reference,
        feedback,
        counterProposal,
        clientExpectation: expectation
      });

      const latest = this.requireMutable(negotiationId);
      if (isPast(latest.deadlineAt)) {
        return { negotiation: this.failForTimeout(latest), decision: 'timeout' };
      }

      const assessment = assessFeedback(reference, expectation, agent.acceptanceLikelihood, this.acceptance, counterProposal);
      const decision = decideRound({
        roundNumber,
        maxRounds: latest.maxRounds,
        gap: assessment.gap,
        threshold: this.acceptance.threshold
      });

      const round = this.store.transaction(() => {
        let proposed: OfferRecord | undefined;
        let nextStatus: NegotiationStatus = 'in_progress';

        if (decision === 'pending_approval') {
          nextStatus = 'pending_approval';
        } else if (decision === 'final_effort') {
          const terms = finalEffortTerms({
            activeOffer: reference,
            agentRevision: agent.revisedOffer,
            expectation,
            costBasis: costBasisOf(vehicle),
            marginTarget: latest.marginTarget,
            client
          });
          proposed = this.offers.propose(negotiationId, terms, { roundNumber, lastConcession: true });
        } else if (decision === 'round_limit_exhausted') {
          nextStatus = 'failed';
        } else if (agent.revisedOffer) {
          proposed = this.offers.propose(negotiationId, agent.revisedOffer, { roundNumber });
        }

        if (!proposed && !activeBefore && nextStatus !== 'failed') {
          proposed = this.offers.propose(negotiationId, offerTermsOf(reference), { roundNumber });
        }

        const record = this.store.insertRound({
          id: generateRoundId(negotiationId, roundNumber),
          negotiationId,
          roundNumber,
          proposal: offerTermsOf(proposed ?? reference),
          reasoning: agent.reasoning,
          feedback,
          counterProposal,
          status: decision === 'pending_approval' || decision === 'round_limit_exhausted' ? 'resolved' : 'ongoing',
          decision,
          gap: assessment.gap,
          acceptanceLikelihood: assessment.acceptanceLikelihood,
          recommendedAction: agent.recommendedAction,
          offerId: proposed?.id,
          createdAt: nowIso()
        });

        if (nextStatus !== latest.status && !canTransitionNegotiation(latest.status, nextStatus)) {
          throw new InvalidTransitionError('Round outcome is not a valid transition', {
            negotiationId,
            from: latest.status,
            to: nextStatus,
            allowed: allowedNextStates(latest.status)
          });
        }

        this.store.patchNegotiation(negotiationId, {
          status: nextStatus,
          roundCount: roundNumber,
          reasoningTrace: [
            ...latest.reasoningTrace,
            traceEntry(`round_${roundNumber}`, `${decision}; gap ${assessment.gap}, likelihood ${assessment.acceptanceLikelihood}`, {
              expectation: assessment.expectation,
              offerId: proposed?.id
            })
          ],
          ...(nextStatus === 'failed' ? { outcomeReason: 'round_limit_exhausted' as const, endedAt: nowIso() } : {})
        });

        return record;
      });

      metrics.recordRound();
      if (decision === 'round_limit_exhausted') metrics.recordOutcome('round_limit_exhausted');

      this.logger.info(
        { negotiationId, roundNumber, decision, gap: assessment.gap, likelihood: assessment.acceptanceLikelihood },
        'negotiation_round_executed'
      );

      return {
        negotiation: this.requireNegotiation(negotiationId),
        decision,
        round,
        activeOffer: this.offers.active(negotiationId)
      };
    });
  }

  async acceptOffer(offerId: string): Promise<OfferActionResult> {
    const offer = this.offers.require(offerId);

    return this.locks.run(offer.negotiationId, async () => {
      const negotiation = this.requireOpen(offer.negotiationId);
      if (!canTransitionNegotiation(negotiation.status, 'concluded')) {
        throw new InvalidTransitionError('Negotiation cannot conclude from its current state', {
          negotiationId: negotiation.id,
          status: negotiation.status
        });
      }

      const vehicle = this.requireVehicle(negotiation.targetVehicleId);

      const result = this.store.transaction(() => {
        const accepted = this.offers.accept(offerId);
        const finalPrice = effectivePrice(accepted);
        const endedAt = nowIso();
        const updated = this.store.patchNegotiation(negotiation.id, {
          status: 'concluded',
          outcomeReason: 'accepted',
          finalPrice,
          marginAchieved: marginOf(finalPrice, costBasisOf(vehicle)),
          chosenOfferType: accepted.offerType,
          endedAt,
          reasoningTrace: [
            ...negotiation.reasoningTrace,
            traceEntry('concluded', `Offer v${accepted.version} accepted at ${finalPrice}`, { offerId })
          ]
        });
        return { negotiation: updated ?? negotiation, offer: accepted };
      });

      metrics.recordOutcome('accepted');
      this.logger.info(
        { negotiationId: negotiation.id, offerId, finalPrice: result.negotiation.finalPrice },
        'negotiation_concluded'
      );
      return result;
    });
  }

  async rejectOffer(offerId: string): Promise<OfferActionResult> {
    const offer = this.offers.require(offerId);

    return this.locks.run(offer.negotiationId, async () => {
      const negotiation = this.requireOpen(offer.negotiationId);

      const result = this.store.transaction(() => {
        const rejected = this.offers.reject(offerId);
        const trace = [
          ...negotiation.reasoningTrace,
          traceEntry('offer_rejected', `Offer v${rejected.version} rejected`, { offerId })
        ];
        // no rounds left to re-propose in: the negotiation cannot recover
        const exhausted = !this.offers.active(negotiation.id) && negotiation.roundCount >= negotiation.maxRounds;
        const updated = this.store.patchNegotiation(
          negotiation.id,
          exhausted
            ? {
                status: 'failed',
                outcomeReason: 'round_limit_exhausted',
                endedAt: nowIso(),
                reasoningTrace: [
                  ...trace,
                  traceEntry('round_limit_exhausted', `No rounds left after rejecting v${rejected.version}`)
                ]
              }
            : { reasoningTrace: trace }
        );
        return { negotiation: updated ?? negotiation, offer: rejected, exhausted };
      });

      this.logger.info({ negotiationId: negotiation.id, offerId, exhausted: result.exhausted }, 'offer_rejected');
      if (result.exhausted) metrics.recordOutcome('round_limit_exhausted');
      return { negotiation: result.negotiation, offer: result.offer };
    });
  }

  abandon(negotiationId: string, reason?: string): Promise<NegotiationRecord> {
    return this.locks.run(negotiationId, async () => {
      const negotiation = this.requireOpen(negotiationId);
      const updated = this.finish(negotiation, 'abandoned', reason ?? 'Abandoned by request');
      this.logger.info({ negotiationId }, 'negotiation_abandoned');
      return updated;
    });
  }

  /** Fails every non-terminal negotiation whose deadline has passed. */
  async expireOverdue(): Promise<string[]> {
    const expired: string[] = [];

    for (const candidate of this.store.listOverdueNegotiations(nowIso())) {
      const done = await this.locks.run(candidate.id, async () => {
        const current = this.store.getNegotiation(candidate.id);
        if (!current || isTerminal(current.status) || !isPast(current.deadlineAt)) return false;
        this.failForTimeout(current);
        return true;
      });
      if (done) expired.push(candidate.id);
    }

    return expired;
  }

  getDetails(negotiationId: string): NegotiationDetails {
    const negotiation = this.requireNegotiation(negotiationId);
    return {
      negotiation,
      offers: this.store.listOffers(negotiationId),
      rounds: this.store.listRounds(negotiationId)
    };
  }

  getHistory(negotiationId: string): NegotiationRoundRecord[] {
    this.requireNegotiation(negotiationId);
    return this.store.listRounds(negotiationId);
  }

  getAnalysis(negotiationId: string): NegotiationAnalysis {
    const negotiation = this.requireNegotiation(negotiationId);
    const offers = this.store.listOffers(negotiationId);
    const end = negotiation.endedAt ? Date.parse(negotiation.endedAt) : Date.now();

    return {
      negotiationId,
      status: negotiation.status,
      outcomeReason: negotiation.outcomeReason,
      roundsExecuted: negotiation.roundCount,
      maxRounds: negotiation.maxRounds,
      tradeInValue: negotiation.tradeInOfferedValue,
      finalPrice: negotiation.finalPrice,
      marginAchieved: negotiation.marginAchieved,
      marginTarget: negotiation.marginTarget,
      chosenOfferType: negotiation.chosenOfferType,
      marketAnalysis: negotiation.marketAnalysis,
      marketDataDegraded: negotiation.marketDataDegraded,
      reasoningTrace: negotiation.reasoningTrace,
      durationMinutes: round2(Math.max(0, end - Date.parse(negotiation.startedAt)) / 60_000),
      offerCount: offers.length,
      activeOfferId: this.offers.active(negotiationId)?.id
    };
  }

  listNegotiations(status?: NegotiationStatus): NegotiationRecord[] {
    return this.store.listNegotiations(status);
  }

  marketSnapshot(make: string, model: string, year: number, fuel: string): Promise<MarketSnapshot> {
    return this.cache.get(make, model, year, fuel);
  }

  private resolveTarget(client: ClientRecord, targetVehicleId?: string): VehicleRecord {
    if (targetVehicleId) {
      const target = this.store.getVehicle(targetVehicleId);
      if (!target) throw new ValidationError('Unknown target vehicle', { targetVehicleId });
      if (!target.inStock) throw new ValidationError('Target vehicle is not in stock', { targetVehicleId });
      return target;
    }

    const suitable = findSuitableVehicle(this.store, client);
    if (!suitable) {
      throw new ValidationError('No in-stock vehicle matches the client preferences and budget', { clientId: client.id });
    }
    return suitable;
  }

  private snapshotFor(vehicle: VehicleRecord): Promise<MarketSnapshot> {
    return this.cache.get(vehicle.make, vehicle.model, vehicle.year, vehicle.fuel);
  }

  private referenceOffer(negotiationId: string): OfferRecord {
    const active = this.offers.active(negotiationId);
    if (active) return active;

    const offers = this.store.listOffers(negotiationId);
    const latest = offers[offers.length - 1];
    if (!latest) {
      throw new InvalidTransitionError('Negotiation has no offer to negotiate on', { negotiationId });
    }
    return latest;
  }

  private transition(negotiationId: string, from: NegotiationStatus, to: NegotiationStatus): void {
    if (!canTransitionNegotiation(from, to)) {
      throw new InvalidTransitionError(`Cannot move from ${from} to ${to}`, {
        negotiationId,
        from,
        to,
        allowed: allowedNextStates(from)
      });
    }
    this.store.patchNegotiation(negotiationId, { status: to });
  }

  private finish(
    negotiation: NegotiationRecord,
    reason: 'abandoned' | 'timeout',
    summary: string
  ): NegotiationRecord {
    if (!canTransitionNegotiation(negotiation.status, 'failed')) {
      throw new ConcurrencyConflict('Negotiation is already terminal', {
        negotiationId: negotiation.id,
        status: negotiation.status
      });
    }

    const updated = this.store.patchNegotiation(negotiation.id, {
      status: 'failed',
      outcomeReason: reason,
      endedAt: nowIso(),
      reasoningTrace: [...negotiation.reasoningTrace, traceEntry(reason, summary)]
    });

    metrics.recordOutcome(reason);
    return updated ?? negotiation;
  }

  private failForTimeout(negotiation: NegotiationRecord): NegotiationRecord {
    this.logger.warn({ negotiationId: negotiation.id, deadlineAt: negotiation.deadlineAt }, 'negotiation_timed_out');
    return this.finish(negotiation, 'timeout', `Deadline ${negotiation.deadlineAt} passed`);
  }

  private requireNegotiation(negotiationId: string): NegotiationRecord {
    const negotiation = this.store.getNegotiation(negotiationId);
    if (!negotiation) throw new NotFoundError('Negotiation not found', { negotiationId });
    return negotiation;
  }

  private requireMutable(negotiationId: string): NegotiationRecord {
    const negotiation = this.requireNegotiation(negotiationId);
    if (isTerminal(negotiation.status)) {
      throw new ConcurrencyConflict('Negotiation is already terminal', {
        negotiationId,
        status: negotiation.status,
        outcomeReason: negotiation.outcomeReason
      });
    }
    return negotiation;
  }

  /** Non-terminal and within its deadline; an overdue negotiation is failed first. */
  private requireOpen(negotiationId: string): NegotiationRecord {
    const negotiation = this.requireMutable(negotiationId);
    if (isPast(negotiation.deadlineAt)) {
      this.failForTimeout(negotiation);
      throw new ConcurrencyConflict('Negotiation timed out', { negotiationId, outcomeReason: 'timeout' });
    }
    return negotiation;
  }

  private requireClient(clientId: string): ClientRecord {
    const client = this.store.getClient(clientId);
    if (!client) throw new NotFoundError('Client not found', { clientId });
    return client;
  }

  private requireVehicle(vehicleId: string): VehicleRecord {
    const vehicle = this.store.getVehicle(vehicleId);
    if (!vehicle) throw new NotFoundError('Vehicle not found', { vehicleId });
    return vehicle;
  }
}
