import type {
  ClientRecord,
  CounterProposal,
  MarketSnapshot,
  NegotiationRoundRecord,
  OfferRecord,
  VehicleRecord
} from '../types/domain.js';
import type { MarketAnalysisResult } from './agentPipeline.js';

export type AgentRole = 'market_analysis' | 'trade_in_evaluation' | 'offer_structuring' | 'negotiation';

export const AGENT_ROLES: readonly AgentRole[] = [
  'market_analysis',
  'trade_in_evaluation',
  'offer_structuring',
  'negotiation'
];

export type MarketAnalysisContext = {
  vehicle: VehicleRecord;
  snapshot: MarketSnapshot;
};

export type TradeInEvaluationContext = {
  vehicle: VehicleRecord;
  snapshot: MarketSnapshot;
  client: ClientRecord;
};

export type OfferStructuringContext = {
  client: ClientRecord;
  vehicle: VehicleRecord;
  snapshot: MarketSnapshot;
  marketAnalysis: MarketAnalysisResult;
  tradeInValue: number;
  marginTarget: number;
};

export type NegotiationContext = {
  negotiationId: string;
  roundNumber: number;
  maxRounds: number;
  client: ClientRecord;
  vehicle: VehicleRecord;
  marginTarget: number;
  history: NegotiationRoundRecord[];
  latestOffer: OfferRecord;
  feedback: string;
  counterProposal?: CounterProposal;
  clientExpectation?: number;
};

export type AgentContextByRole = {
  market_analysis: MarketAnalysisContext;
  trade_in_evaluation: TradeInEvaluationContext;
  offer_structuring: OfferStructuringContext;
  negotiation: NegotiationContext;
};

export type ReasoningFailureKind = 'timeout' | 'malformed_output' | 'backend_unavailable';

export class ReasoningBackendError extends Error {
  readonly kind: ReasoningFailureKind;

  constructor(kind: ReasoningFailureKind, message: string) {
    super(message);
    this.name = 'ReasoningBackendError';
    this.kind = kind;
  }
}

export type InvokeOptions = {
  signal: AbortSignal;
};

/**
 * Produces the raw output of one agent role. Results are untrusted: the
 * pipeline validates them before anything reads a field.
 */
export type ReasoningBackend = {
  readonly name: string;
  invoke<R extends AgentRole>(role: R, context: AgentContextByRole[R], options: InvokeOptions): Promise<unknown>;
};

export type HttpReasoningBackendOptions = {
  baseUrl: string;
  token?: string;
};

function requestHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'content-type': 'application/json',
    accept: 'application/json'
  };

  if (token) headers.authorization = `Bearer ${token}`;
  return headers;
}

export function createHttpReasoningBackend(options: HttpReasoningBackendOptions): ReasoningBackend {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  return {
    name: 'http',
    async invoke(role, context, invokeOptions) {
      const url = `${baseUrl}/agents/${role}`;
      let response: Response;

      try {
        response = await fetch(url, {
          method: 'POST',
          headers: requestHeaders(options.token),
          body: JSON.stringify({
            protocol: 'autotrade-negotiation/agent-v1',
            role,
            context
          }),
          signal: invokeOptions.signal
        });
      } catch (error) {
        if (invokeOptions.signal.aborted) {
          throw new ReasoningBackendError('timeout', `${role}:request_aborted`);
        }
        const message = error instanceof Error ? error.message : 'request_failed';
        throw new ReasoningBackendError('backend_unavailable', `${role}:${message}`);
      }

      if (!response.ok) {
        throw new ReasoningBackendError('backend_unavailable', `${role}:http_${response.status}`);
      }

      const payload: unknown = await response.json().catch(() => undefined);
      if (payload === undefined) {
        throw new ReasoningBackendError('malformed_output', `${role}:invalid_json`);
      }

      return payload;
    }
  };
}
