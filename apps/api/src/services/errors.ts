import type { FastifyReply } from 'fastify';

export type ErrorCode =
  | 'invalid_request'
  | 'unauthorized'
  | 'not_found'
  | 'invalid_state_transition'
  | 'negotiation_terminal'
  | 'offer_not_active'
  | 'agent_failure'
  | 'market_data_unavailable'
  | 'rate_limited'
  | 'internal_error';

export type ApiErrorEnvelope = {
  ok: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
};

export class NegotiationError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, statusCode: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/** Rejected before any state is touched. */
export class ValidationError extends NegotiationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('invalid_request', 400, message, details);
  }
}

export class NotFoundError extends NegotiationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('not_found', 404, message, details);
  }
}

export class ConcurrencyConflict extends NegotiationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('negotiation_terminal', 409, message, details);
  }
}

export class InvalidTransitionError extends NegotiationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('invalid_state_transition', 409, message, details);
  }
}

export class OfferNotActiveError extends NegotiationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('offer_not_active', 409, message, details);
  }
}

/** Reasoning backend exhausted its retry budget; the round was not applied. */
export class AgentFailure extends NegotiationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('agent_failure', 502, message, details);
  }
}

export class MarketDataUnavailable extends NegotiationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('market_data_unavailable', 503, message, details);
  }
}

export function sendError(
  reply: FastifyReply,
  statusCode: number,
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): FastifyReply {
  const payload: ApiErrorEnvelope = {
    ok: false,
    error: {
      code,
      message,
      ...(details ? { details } : {})
    }
  };

  return reply.code(statusCode).send(payload);
}

export function sendNegotiationError(reply: FastifyReply, error: NegotiationError): FastifyReply {
  return sendError(reply, error.statusCode, error.code, error.message, error.details);
}
