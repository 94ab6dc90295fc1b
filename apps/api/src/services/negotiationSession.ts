import type { ClientRecord, CounterProposal, OfferTerms, RoundDecision } from '../types/domain.js';
import { effectivePrice, marginFloor, meetsMargin, netPrice, offerTermsOf, repriceTerms, withinBudget } from './pricing.js';
import { clamp, round2, round4 } from '../utils/money.js';

export type AcceptancePolicy = {
  threshold: number;
  gapScale: number;
};

const MIN_TEXT_AMOUNT = 500;
const MODEL_YEAR = /^(19[5-9]\d|20\d\d|2100)$/;

const DURATION_PHRASE = /\b\d+\s*-?\s*(?:months?|mos?|years?|yrs?)\b/gi;
const MONTHLY_AMOUNT = /(\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?)\s*(?:\/\s*mo(?:nth)?\b|per month\b|a month\b|monthly\b)/gi;
const AMOUNT = /([$€£]\s*)?(\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?)(\s*k\b)?/gi;
const REFUSAL = /\b(?:no deal|not (?:ok|okay|agreed|accept(?:able)?)|(?:don't|do not|won't|cannot|can't) accept)\b/i;
const ACCEPTANCE = /\b(?:deal|accept(?:ed)?|agreed?|ok(?:ay)?|sounds good)\b/i;

function parseAmount(digits: string, thousands: boolean): number {
  const value = Number(digits.replace(/,/g, ''));
  return thousands ? value * 1000 : value;
}

function lastMatch(pattern: RegExp, text: string): RegExpExecArray | undefined {
  let last: RegExpExecArray | undefined;
  for (const match of text.matchAll(pattern)) {
    last = match;
  }
  return last;
}

/** Price the client names in free text, if any. */
export function priceFromText(text: string, monthlyDuration?: number): number | undefined {
  if (monthlyDuration) {
    const monthly = lastMatch(MONTHLY_AMOUNT, text);
    if (monthly?.[1]) return round2(parseAmount(monthly[1], false) * monthlyDuration);
  }

  const withoutDurations = text.replace(DURATION_PHRASE, ' ').replace(MONTHLY_AMOUNT, ' ');
  let found: number | undefined;
  for (const match of withoutDurations.matchAll(AMOUNT)) {
    const [, currency, digits, thousands] = match;
    if (!digits) continue;
    // a bare four-digit year names the car, not a price
    if (!currency && !thousands && MODEL_YEAR.test(digits)) continue;
    const amount = parseAmount(digits, Boolean(thousands));
    if (amount >= MIN_TEXT_AMOUNT) found = amount;
  }

  return found === undefined ? undefined : round2(found);
}

/**
 * The effective price the client signals: an explicit counter-proposal wins,
 * then a price in the text, then an acceptance phrase (the active price).
 * A counter trade-in value is folded in as an effective-price equivalent, so
 * asking 1000 more for the trade-in reads as 1000 less on the price.
 */
export function clientExpectation(
  activeOffer: OfferTerms,
  feedback: string,
  counterProposal?: CounterProposal
): number | undefined {
  const counterTradeIn = counterProposal?.tradeInValue;
  if (counterTradeIn != null) {
    const base = counterPrice(activeOffer, counterProposal) ?? effectivePrice(activeOffer);
    return round2(base - (counterTradeIn - activeOffer.tradeInValue));
  }

  const countered = counterPrice(activeOffer, counterProposal);
  if (countered !== undefined) return countered;

  const fromText = priceFromText(feedback, activeOffer.durationMonths);
  if (fromText !== undefined) return fromText;

  if (!REFUSAL.test(feedback) && ACCEPTANCE.test(feedback)) {
    return effectivePrice(activeOffer);
  }

  return undefined;
}

function counterPrice(activeOffer: OfferTerms, counterProposal?: CounterProposal): number | undefined {
  if (counterProposal?.price != null && counterProposal.price > 0) {
    return round2(counterProposal.price);
  }

  if (counterProposal?.monthlyPayment != null && counterProposal.monthlyPayment > 0) {
    const duration = counterProposal.durationMonths ?? activeOffer.durationMonths;
    if (duration) return round2(counterProposal.monthlyPayment * duration);
  }

  return undefined;
}

export function priceGap(effective: number, expectation: number): number {
  if (effective <= 0) return 0;
  return round4(Math.max(0, effective - expectation) / effective);
}

export function acceptanceLikelihood(gap: number, gapScale: number): number {
  return round4(clamp(1 - gap / gapScale, 0, 1));
}

export type FeedbackAssessment = {
  expectation?: number;
  gap: number;
  acceptanceLikelihood: number;
};

export function assessFeedback(
  activeOffer: OfferTerms,
  expectation: number | undefined,
  agentLikelihood: number,
  policy: AcceptancePolicy,
  counterProposal?: CounterProposal
): FeedbackAssessment {
  let gap: number;
  if (expectation === undefined) {
    gap = round4((1 - clamp(agentLikelihood, 0, 1)) * policy.gapScale);
  } else if (counterProposal?.tradeInValue != null) {
    // trade-in disputes are measured on what the client actually pays
    gap = priceGap(netPrice(activeOffer), expectation - activeOffer.tradeInValue);
  } else {
    gap = priceGap(effectivePrice(activeOffer), expectation);
  }

  return {
    expectation,
    gap,
    acceptanceLikelihood: acceptanceLikelihood(gap, policy.gapScale)
  };
}

export function decideRound(input: {
  roundNumber: number;
  maxRounds: number;
  gap: number;
  threshold: number;
}): RoundDecision {
  if (input.gap <= input.threshold) return 'pending_approval';
  if (input.roundNumber === input.maxRounds - 1) return 'final_effort';
  if (input.roundNumber >= input.maxRounds) return 'round_limit_exhausted';
  return 'revised';
}

/**
 * Last concession before the round limit: the agent's revision when it gave
 * one, otherwise the midpoint towards the client (or towards the margin floor
 * when the client named no price). Never below cost.
 */
export function finalEffortTerms(input: {
  activeOffer: OfferTerms;
  agentRevision?: OfferTerms;
  expectation?: number;
  costBasis: number;
  marginTarget: number;
  client: Pick<ClientRecord, 'budgetMin' | 'budgetMax'>;
}): OfferTerms {
  const base = input.agentRevision ?? offerTermsOf(input.activeOffer);
  const current = effectivePrice(input.activeOffer);

  let target = effectivePrice(base);
  if (!input.agentRevision) {
    const towards = input.expectation ?? Math.min(current, marginFloor(input.costBasis, input.marginTarget));
    target = (current + Math.min(current, towards)) / 2;
  }

  const priced = repriceTerms(base, Math.max(target, input.costBasis));
  return {
    ...priced,
    concession: !meetsMargin(priced, input.costBasis, input.marginTarget),
    budgetConflict: !withinBudget(priced, input.client),
    justification: input.agentRevision
      ? priced.justification
      : `Final offer at ${effectivePrice(priced)} before the round limit`
  };
}
