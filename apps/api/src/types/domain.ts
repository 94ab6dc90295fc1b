export type FuelType = 'petrol' | 'diesel' | 'hybrid' | 'electric';

export type Transmission = 'manual' | 'automatic';

export type VehicleCondition = 'excellent' | 'good' | 'fair' | 'poor';

export type VehicleRecord = {
  id: string;
  vin: string;
  make: string;
  model: string;
  year: number;
  fuel: FuelType;
  transmission: Transmission;
  mileage: number;
  condition: VehicleCondition;
  marketValue: number;
  costBasis?: number;
  listPrice?: number;
  inStock: boolean;
  createdAt: string;
  updatedAt: string;
};

export type OfferType = 'purchase' | 'lease' | 'subscription';

export type OfferPreference = OfferType | 'flexible';

export type ClientRecord = {
  id: string;
  firstName: string;
  lastName: string;
  email?: string;
  budgetMin: number;
  budgetMax: number;
  preferredFuel?: FuelType;
  preferredTransmission?: Transmission;
  offerPreference: OfferPreference;
  loyaltyScore: number;
  riskScore: number;
  createdAt: string;
  updatedAt: string;
};

export type MarketQuery = {
  make: string;
  model: string;
  year: number;
  fuel: string;
};

export type MarketStats = {
  avgPrice: number;
  minPrice: number;
  maxPrice: number;
  listingCount: number;
  confidence: number;
};

export type MarketSnapshot = MarketQuery & MarketStats & {
  key: string;
  computedAt: number;
  fingerprint: string;
  degraded: boolean;
};

export type NegotiationStatus =
  | 'initiated'
  | 'in_progress'
  | 'pending_approval'
  | 'concluded'
  | 'failed';

export type NegotiationOutcomeReason =
  | 'accepted'
  | 'round_limit_exhausted'
  | 'timeout'
  | 'abandoned';

export type ReasoningTraceEntry = {
  stage: string;
  summary: string;
  at: string;
  data?: Record<string, unknown>;
};

export type OfferBenefits = {
  warrantyMonths: number;
  maintenanceIncluded: boolean;
  roadsideAssistance: boolean;
  insuranceIncluded: boolean;
};

/** Commercial terms of an offer, as produced by an agent or a counter-proposal. */
export type OfferTerms = {
  offerType: OfferType;
  tradeInValue: number;
  purchasePrice?: number;
  monthlyPayment?: number;
  durationMonths?: number;
  benefits: OfferBenefits;
  confidence: number;
  justification: string;
  concession: boolean;
  budgetConflict: boolean;
};

export type OfferStatus = 'proposed' | 'accepted' | 'rejected' | 'negotiating';

export type OfferRecord = OfferTerms & {
  id: string;
  negotiationId: string;
  version: number;
  roundNumber: number;
  totalCost: number;
  lastConcession: boolean;
  status: OfferStatus;
  supersededById?: string;
  createdAt: string;
  updatedAt: string;
};

export type NegotiationRecord = {
  id: string;
  status: NegotiationStatus;
  clientId: string;
  tradeInVehicleId?: string;
  targetVehicleId: string;
  marginTarget: number;
  roundCount: number;
  maxRounds: number;
  reasoningTrace: ReasoningTraceEntry[];
  marketSnapshotKey: string;
  marketDataDegraded: boolean;
  marketAnalysis: Record<string, unknown>;
  tradeInEvaluation?: Record<string, unknown>;
  tradeInOfferedValue?: number;
  offerAlternatives: OfferTerms[];
  finalPrice?: number;
  marginAchieved?: number;
  chosenOfferType?: OfferType;
  outcomeReason?: NegotiationOutcomeReason;
  startedAt: string;
  deadlineAt: string;
  endedAt?: string;
  updatedAt: string;
};

export type CounterProposal = {
  price?: number;
  monthlyPayment?: number;
  durationMonths?: number;
  tradeInValue?: number;
};

export type RoundStatus = 'ongoing' | 'resolved';

export type RoundDecision =
  | 'pending_approval'
  | 'final_effort'
  | 'revised'
  | 'round_limit_exhausted';

export type RecommendedAction = 'accept' | 'adjust' | 'hold_firm' | 'close';

export type NegotiationRoundRecord = {
  id: string;
  negotiationId: string;
  roundNumber: number;
  proposal: Record<string, unknown>;
  reasoning: string;
  feedback: string;
  counterProposal?: CounterProposal;
  status: RoundStatus;
  decision: RoundDecision;
  gap: number;
  acceptanceLikelihood: number;
  recommendedAction: RecommendedAction;
  offerId?: string;
  createdAt: string;
};

export type NegotiationDetails = {
  negotiation: NegotiationRecord;
  offers: OfferRecord[];
  rounds: NegotiationRoundRecord[];
};

export type PolicySnapshot = {
  maxRounds: number;
  sessionTimeoutMs: number;
  defaultMarginTarget: number;
  acceptanceThreshold: number;
  acceptanceGapScale: number;
  marketSnapshotTtlMs: number;
  marketAggregationTimeoutMs: number;
  agentTimeoutMs: number;
  agentMaxAttempts: number;
  agentBackoffMs: number;
  reasoningBackend: 'http' | 'rules';
  marketSourcesConfigured: number;
  expiryAutomationEnabled: boolean;
  expiryAutomationIntervalMs: number;
};
