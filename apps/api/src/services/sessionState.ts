import type { NegotiationStatus } from '../types/domain.js';

const NEXT_STATES: Record<NegotiationStatus, NegotiationStatus[]> = {
  initiated: ['in_progress', 'failed'],
  in_progress: ['pending_approval', 'concluded', 'failed'],
  pending_approval: ['in_progress', 'concluded', 'failed'],
  concluded: [],
  failed: []
};

export function canTransitionNegotiation(current: NegotiationStatus, next: NegotiationStatus): boolean {
  return NEXT_STATES[current]?.includes(next) ?? false;
}

export function allowedNextStates(current: NegotiationStatus): NegotiationStatus[] {
  return [...(NEXT_STATES[current] ?? [])];
}

export function isTerminal(status: NegotiationStatus): boolean {
  return NEXT_STATES[status].length === 0;
}

/** Statuses from which another round may be played. */
export function acceptsRounds(status: NegotiationStatus): boolean {
  return status === 'in_progress' || status === 'pending_approval';
}
