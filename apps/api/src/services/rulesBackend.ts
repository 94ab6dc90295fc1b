import type { OfferBenefits, OfferTerms, OfferType, VehicleCondition } from '../types/domain.js';
import type {
  MarketAnalysisResult,
  NegotiationAgentResult,
  OfferStructuringResult,
  TradeInEvaluationResult
} from './agentPipeline.js';
import {
  costBasisOf,
  effectivePrice,
  listPriceOf,
  marginFloor,
  marginOf,
  meetsMargin,
  offerTermsOf,
  repriceTerms,
  withinBudget
} from './pricing.js';
import type {
  AgentContextByRole,
  AgentRole,
  MarketAnalysisContext,
  NegotiationContext,
  OfferStructuringContext,
  ReasoningBackend,
  TradeInEvaluationContext
} from './reasoningBackend.js';
import { clamp, round2, round4 } from '../utils/money.js';

const TRADE_IN_BASE_RATIO = 0.85;
const LOYALTY_BONUS_RATE = 0.03;
const CONCESSION_STEP = 0.5;

const CONDITION_ADJUSTMENT: Record<VehicleCondition, number> = {
  excellent: 0.05,
  good: 0,
  fair: -0.05,
  poor: -0.12
};

type OfferProfile = {
  factor: number;
  durationMonths?: number;
  benefits: OfferBenefits;
};

const OFFER_PROFILES: Record<OfferType, OfferProfile> = {
  purchase: {
    factor: 1,
    benefits: { warrantyMonths: 24, maintenanceIncluded: false, roadsideAssistance: true, insuranceIncluded: false }
  },
  lease: {
    factor: 1.08,
    durationMonths: 48,
    benefits: { warrantyMonths: 48, maintenanceIncluded: true, roadsideAssistance: true, insuranceIncluded: false }
  },
  subscription: {
    factor: 1.12,
    durationMonths: 24,
    benefits: { warrantyMonths: 24, maintenanceIncluded: true, roadsideAssistance: true, insuranceIncluded: true }
  }
};

const NEGATIVE_FEEDBACK = /\b(too (high|expensive|much)|expensive|no deal|not interested|walk away|can't afford|cannot afford)\b/i;

export function offerTypesFor(preference: OfferType | 'flexible'): OfferType[] {
  return preference === 'flexible' ? ['purchase', 'lease', 'subscription'] : [preference];
}

export function analyzeMarket({ vehicle, snapshot }: MarketAnalysisContext): MarketAnalysisResult {
  const demandLevel = snapshot.listingCount >= 30 ? 'high' : snapshot.listingCount >= 10 ? 'medium' : 'low';
  const ratio = listPriceOf(vehicle) / snapshot.avgPrice;
  const pricingPosition = ratio > 1.05 ? 'above' : ratio < 0.95 ? 'below' : 'at';

  let recommendedStrategy: MarketAnalysisResult['recommendedStrategy'] = 'balanced';
  if (demandLevel === 'high' && pricingPosition !== 'above') recommendedStrategy = 'premium';
  if (demandLevel === 'low' || pricingPosition === 'above') recommendedStrategy = 'aggressive';

  const riskFactors: string[] = [];
  if (snapshot.degraded) riskFactors.push('market_data_degraded');
  if (snapshot.confidence < 0.5) riskFactors.push('low_market_confidence');
  if (vehicle.mileage > 150_000) riskFactors.push('high_mileage');

  return {
    demandLevel,
    pricingPosition,
    competitiveFactors: [
      `listing_count:${snapshot.listingCount}`,
      `price_range:${round2(snapshot.minPrice)}-${round2(snapshot.maxPrice)}`,
      `list_to_market_ratio:${round4(ratio)}`
    ],
    recommendedStrategy,
    riskFactors
  };
}

export function evaluateTradeIn({ vehicle, snapshot, client }: TradeInEvaluationContext): TradeInEvaluationResult {
  const baseValue = round2(Math.min(vehicle.marketValue, snapshot.avgPrice) * TRADE_IN_BASE_RATIO);
  const conditionAdjustment = round2(baseValue * CONDITION_ADJUSTMENT[vehicle.condition]);
  const loyaltyBonus = round2(baseValue * LOYALTY_BONUS_RATE * client.loyaltyScore * (1 - client.riskScore));
  const finalValue = round2(Math.max(0, baseValue + conditionAdjustment + loyaltyBonus));
  const confidence = round4(clamp(snapshot.degraded ? snapshot.confidence * 0.8 : snapshot.confidence, 0, 1));

  return {
    baseValue,
    conditionAdjustment,
    loyaltyBonus,
    finalValue,
    confidence,
    justification:
      `${vehicle.condition} condition ${vehicle.make} ${vehicle.model} valued at ${TRADE_IN_BASE_RATIO * 100}% ` +
      `of ${round2(Math.min(vehicle.marketValue, snapshot.avgPrice))} with loyalty bonus ${loyaltyBonus}`
  };
}

function flagTerms(terms: OfferTerms, context: Pick<OfferStructuringContext, 'client' | 'vehicle' | 'marginTarget'>): OfferTerms {
  return {
    ...terms,
    concession: !meetsMargin(terms, costBasisOf(context.vehicle), context.marginTarget),
    budgetConflict: !withinBudget(terms, context.client)
  };
}

function anchorPrice(context: OfferStructuringContext): number {
  const list = listPriceOf(context.vehicle);
  if (context.marketAnalysis.recommendedStrategy === 'aggressive') {
    return Math.min(list, context.snapshot.avgPrice);
  }
  return list;
}

function ceil2(value: number): number {
  return Math.ceil(value * 100 - 1e-6) / 100;
}

function floor2(value: number): number {
  return Math.floor(value * 100 + 1e-6) / 100;
}

/**
 * Prices each offer type at the strategy anchor, pulled into the client's
 * budget. When budget and margin floor cannot both hold, the floor wins and
 * the offer is flagged as a budget conflict.
 */
export function structureOffers(context: OfferStructuringContext): OfferStructuringResult {
  const { client, vehicle, tradeInValue, marginTarget, snapshot } = context;
  const floor = marginFloor(costBasisOf(vehicle), marginTarget);
  const low = Math.max(floor, client.budgetMin + tradeInValue);
  const high = client.budgetMax + tradeInValue;

  const offers = offerTypesFor(client.offerPreference).map((offerType) => {
    const profile = OFFER_PROFILES[offerType];
    const periods = profile.durationMonths ?? 1;
    const periodLow = ceil2(low / periods);
    const periodHigh = floor2(high / periods);
    const periodAnchor = round2((anchorPrice(context) * profile.factor) / periods);
    const periodPrice = periodLow > periodHigh
      ? ceil2(floor / periods)
      : Math.min(Math.max(periodAnchor, periodLow), periodHigh);

    const priced: OfferTerms = {
      offerType,
      tradeInValue,
      ...(profile.durationMonths
        ? { monthlyPayment: periodPrice, durationMonths: profile.durationMonths }
        : { purchasePrice: periodPrice }),
      benefits: { ...profile.benefits },
      confidence: 0,
      justification: '',
      concession: false,
      budgetConflict: false
    };

    const terms = flagTerms(priced, context);
    const effective = effectivePrice(terms);
    return {
      ...terms,
      confidence: round4(clamp(snapshot.confidence * (terms.budgetConflict ? 0.6 : 1), 0.1, 0.95)),
      justification:
        `${offerType} at ${effective} against list ${round2(listPriceOf(vehicle))}; ` +
        `margin ${marginOf(effective, costBasisOf(vehicle))}`
    };
  });

  return { offers };
}

/**
 * Concedes half of the remaining distance to the client's expectation, but
 * never below the margin floor.
 */
export function negotiate(context: NegotiationContext): NegotiationAgentResult {
  const current = effectivePrice(context.latestOffer);
  const expectation = context.clientExpectation;

  if (expectation === undefined) {
    const negative = NEGATIVE_FEEDBACK.test(context.feedback);
    return {
      acceptanceLikelihood: negative ? 0.4 : 0.6,
      reasoning: negative
        ? 'Client objects without naming a price; holding current terms'
        : 'No price signal in feedback; holding current terms',
      recommendedAction: 'hold_firm'
    };
  }

  const gap = current > 0 ? Math.max(0, current - expectation) / current : 0;
  if (gap <= 0.02) {
    return {
      acceptanceLikelihood: round4(clamp(1 - gap, 0, 1)),
      reasoning: `Client expectation ${round2(expectation)} is within reach of ${current}`,
      recommendedAction: 'accept'
    };
  }

  const floor = marginFloor(costBasisOf(context.vehicle), context.marginTarget);
  const target = Math.max(current - (current - expectation) * CONCESSION_STEP, floor);

  if (target >= current - 0.01) {
    return {
      acceptanceLikelihood: round4(clamp(1 - gap * 2, 0.05, 0.9)),
      reasoning: `Current price ${current} already sits at the margin floor ${floor}`,
      recommendedAction: 'hold_firm'
    };
  }

  const revised = flagTerms(repriceTerms(offerTermsOf(context.latestOffer), target), context);
  const revisedPrice = effectivePrice(revised);

  return {
    revisedOffer: {
      ...revised,
      justification: `Moved from ${current} to ${revisedPrice} towards client expectation ${round2(expectation)}`
    },
    acceptanceLikelihood: round4(clamp(1 - ((revisedPrice - expectation) / revisedPrice) * 2, 0.05, 0.95)),
    reasoning: `Conceding ${round2(current - revisedPrice)} in round ${context.roundNumber} of ${context.maxRounds}`,
    recommendedAction: 'adjust'
  };
}

type RoleHandlers = { [R in AgentRole]: (context: AgentContextByRole[R]) => unknown };

const handlers: RoleHandlers = {
  market_analysis: analyzeMarket,
  trade_in_evaluation: evaluateTradeIn,
  offer_structuring: structureOffers,
  negotiation: negotiate
};

/** Deterministic heuristics used when no remote reasoning service is configured. */
export function createRulesBackend(): ReasoningBackend {
  return {
    name: 'rules',
    async invoke(role, context) {
      const handler: (context: AgentContextByRole[typeof role]) => unknown = handlers[role];
      return handler(context);
    }
  };
}
