import type { NegotiationOrchestrator } from './orchestrator.js';
import { expiryAutomationEnabledByDefault, expiryAutomationIntervalMsByDefault } from './policy.js';
import type { Store } from './store.js';
import { nowIso } from '../utils/time.js';

export type ExpiryTickSummary = {
  ranAt: string;
  expired: number;
  negotiationIds: string[];
};

export function expiryAutomationConfig() {
  return {
    enabled: expiryAutomationEnabledByDefault(),
    intervalMs: expiryAutomationIntervalMsByDefault()
  };
}

export async function runExpiryAutomationTick(orchestrator: NegotiationOrchestrator): Promise<ExpiryTickSummary> {
  const ranAt = nowIso();
  const negotiationIds = await orchestrator.expireOverdue();

  return {
    ranAt,
    expired: negotiationIds.length,
    negotiationIds
  };
}

export function automationStatus(store: Store) {
  const now = nowIso();
  const open = [
    ...store.listNegotiations('initiated'),
    ...store.listNegotiations('in_progress'),
    ...store.listNegotiations('pending_approval')
  ];
  const overdue = store.listOverdueNegotiations(now);

  return {
    config: expiryAutomationConfig(),
    totals: {
      open: open.length,
      overdue: overdue.length
    },
    overdue: overdue.map((item) => ({
      negotiationId: item.id,
      status: item.status,
      deadlineAt: item.deadlineAt,
      roundCount: item.roundCount
    }))
  };
}
