import type { ClientRecord, OfferTerms, VehicleRecord } from '../types/domain.js';
import { round2, round4 } from '../utils/money.js';

type PricedTerms = Pick<OfferTerms, 'offerType' | 'purchasePrice' | 'monthlyPayment' | 'durationMonths' | 'tradeInValue'>;

export function costBasisOf(vehicle: VehicleRecord): number {
  return vehicle.costBasis ?? vehicle.marketValue;
}

export function listPriceOf(vehicle: VehicleRecord): number {
  return vehicle.listPrice ?? vehicle.marketValue;
}

/**
 * Price the dealer receives for the vehicle. Lease and subscription offers are
 * normalized to the sum of their monthly payments.
 */
export function effectivePrice(terms: PricedTerms): number {
  if (terms.offerType === 'purchase') {
    return round2(terms.purchasePrice ?? 0);
  }

  return round2((terms.monthlyPayment ?? 0) * (terms.durationMonths ?? 0));
}

/** What the client pays once the trade-in is credited. */
export function netPrice(terms: PricedTerms): number {
  return round2(effectivePrice(terms) - terms.tradeInValue);
}

export function marginOf(price: number, costBasis: number): number {
  if (price <= 0) return 0;
  return round4((price - costBasis) / price);
}

/** Lowest effective price, in whole cents, that still meets the margin target. */
export function marginFloor(costBasis: number, marginTarget: number): number {
  return Math.ceil((costBasis / (1 - marginTarget)) * 100 - 1e-6) / 100;
}

export function meetsMargin(terms: PricedTerms, costBasis: number, marginTarget: number): boolean {
  const price = effectivePrice(terms);
  if (price <= 0) return false;
  return (price - costBasis) / price >= marginTarget - 1e-9;
}

export function withinBudget(terms: PricedTerms, client: Pick<ClientRecord, 'budgetMin' | 'budgetMax'>): boolean {
  const net = netPrice(terms);
  return net >= client.budgetMin - 0.005 && net <= client.budgetMax + 0.005;
}

/**
 * Expresses an effective price in the same shape as the given terms, keeping
 * the offer type and duration.
 */
export function repriceTerms<T extends PricedTerms>(terms: T, price: number): T {
  if (terms.offerType === 'purchase') {
    return { ...terms, purchasePrice: round2(price) };
  }

  const duration = terms.durationMonths && terms.durationMonths > 0 ? terms.durationMonths : 1;
  return { ...terms, monthlyPayment: round2(price / duration), durationMonths: duration };
}

/** Commercial terms of a stored offer, without its bookkeeping fields. */
export function offerTermsOf(offer: OfferTerms): OfferTerms {
  return {
    offerType: offer.offerType,
    tradeInValue: offer.tradeInValue,
    purchasePrice: offer.purchasePrice,
    monthlyPayment: offer.monthlyPayment,
    durationMonths: offer.durationMonths,
    benefits: { ...offer.benefits },
    confidence: offer.confidence,
    justification: offer.justification,
    concession: offer.concession,
    budgetConflict: offer.budgetConflict
  };
}
