import type { PolicySnapshot } from '../types/domain.js';

function envFlag(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (value == null || value.trim() === '') return fallback;
  return value.trim().toLowerCase() !== 'false';
}

function envNumber(name: string, fallback: number, min?: number, max?: number): number {
  const value = process.env[name];
  const parsed = Number(value);
  if (value == null || value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) return fallback;

  const boundedMin = min == null ? parsed : Math.max(parsed, min);
  return max == null ? boundedMin : Math.min(boundedMin, max);
}

function envInteger(name: string, fallback: number, min?: number, max?: number): number {
  return Math.floor(envNumber(name, fallback, min, max));
}

function envList(name: string): string[] {
  const value = process.env[name];
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function maxRoundsByDefault(): number {
  return envInteger('NEG_MAX_ROUNDS', 10, 1, 50);
}

export function sessionTimeoutMsByDefault(): number {
  return envInteger('NEG_SESSION_TIMEOUT_MS', 300_000, 1_000, 24 * 60 * 60 * 1000);
}

export function marginTargetByDefault(): number {
  return envNumber('NEG_MARGIN_TARGET', 0.15, 0.0001, 0.9);
}

export function acceptanceThresholdByDefault(): number {
  return envNumber('NEG_ACCEPTANCE_THRESHOLD', 0.02, 0.0001, 0.5);
}

export function acceptanceGapScaleByDefault(): number {
  return envNumber('NEG_ACCEPTANCE_GAP_SCALE', 0.2, 0.01, 1);
}

export function marketSnapshotTtlMsByDefault(): number {
  return envInteger('NEG_MARKET_SNAPSHOT_TTL_MS', 24 * 60 * 60 * 1000, 1_000);
}

export function marketAggregationTimeoutMsByDefault(): number {
  return envInteger('NEG_MARKET_AGGREGATION_TIMEOUT_MS', 10_000, 100, 120_000);
}

export function marketSourceUrlsByDefault(): string[] {
  return envList('NEG_MARKET_SOURCE_URLS');
}

export function agentTimeoutMsByDefault(): number {
  return envInteger('NEG_AGENT_TIMEOUT_MS', 15_000, 100, 120_000);
}

export function agentMaxAttemptsByDefault(): number {
  return envInteger('NEG_AGENT_MAX_ATTEMPTS', 3, 1, 10);
}

export function agentBackoffMsByDefault(): number {
  const value = process.env.NEG_AGENT_BACKOFF_MS;
  if (value?.trim() === '0') return 0;
  return envInteger('NEG_AGENT_BACKOFF_MS', 250, 1, 30_000);
}

export function reasoningBackendUrlByDefault(): string | undefined {
  return process.env.NEG_REASONING_BACKEND_URL?.trim() || undefined;
}

export function reasoningBackendTokenByDefault(): string | undefined {
  return process.env.NEG_REASONING_BACKEND_TOKEN?.trim() || undefined;
}

export function expiryAutomationEnabledByDefault(): boolean {
  return envFlag('NEG_AUTOMATION_EXPIRY_ENABLED', true);
}

export function expiryAutomationIntervalMsByDefault(): number {
  return envInteger('NEG_AUTOMATION_EXPIRY_INTERVAL_MS', 15_000, 1_000);
}

export function policySnapshot(): PolicySnapshot {
  return {
    maxRounds: maxRoundsByDefault(),
    sessionTimeoutMs: sessionTimeoutMsByDefault(),
    defaultMarginTarget: marginTargetByDefault(),
    acceptanceThreshold: acceptanceThresholdByDefault(),
    acceptanceGapScale: acceptanceGapScaleByDefault(),
    marketSnapshotTtlMs: marketSnapshotTtlMsByDefault(),
    marketAggregationTimeoutMs: marketAggregationTimeoutMsByDefault(),
    agentTimeoutMs: agentTimeoutMsByDefault(),
    agentMaxAttempts: agentMaxAttemptsByDefault(),
    agentBackoffMs: agentBackoffMsByDefault(),
    reasoningBackend: reasoningBackendUrlByDefault() ? 'http' : 'rules',
    marketSourcesConfigured: marketSourceUrlsByDefault().length,
    expiryAutomationEnabled: expiryAutomationEnabledByDefault(),
    expiryAutomationIntervalMs: expiryAutomationIntervalMsByDefault()
  };
}
