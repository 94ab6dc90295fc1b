import { afterEach, describe, expect, it } from 'vitest';
import {
  acceptanceThresholdByDefault,
  agentBackoffMsByDefault,
  expiryAutomationEnabledByDefault,
  marginTargetByDefault,
  marketSourceUrlsByDefault,
  maxRoundsByDefault,
  policySnapshot,
  sessionTimeoutMsByDefault
} from './policy.js';

const touchedVars = [
  'NEG_MAX_ROUNDS',
  'NEG_SESSION_TIMEOUT_MS',
  'NEG_MARGIN_TARGET',
  'NEG_ACCEPTANCE_THRESHOLD',
  'NEG_AGENT_BACKOFF_MS',
  'NEG_MARKET_SOURCE_URLS',
  'NEG_REASONING_BACKEND_URL',
  'NEG_AUTOMATION_EXPIRY_ENABLED'
] as const;

afterEach(() => {
  for (const key of touchedVars) delete process.env[key];
});

describe('policy defaults', () => {
  it('uses built-in defaults when nothing is set', () => {
    expect(maxRoundsByDefault()).toBe(10);
    expect(sessionTimeoutMsByDefault()).toBe(300_000);
    expect(marginTargetByDefault()).toBe(0.15);
    expect(acceptanceThresholdByDefault()).toBe(0.02);
    expect(agentBackoffMsByDefault()).toBe(250);
    expect(expiryAutomationEnabledByDefault()).toBe(true);
    expect(marketSourceUrlsByDefault()).toEqual([]);
  });

  it('reads and clamps numeric overrides', () => {
    process.env.NEG_MAX_ROUNDS = '500';
    process.env.NEG_SESSION_TIMEOUT_MS = '10';
    process.env.NEG_MARGIN_TARGET = '0.2';

    expect(maxRoundsByDefault()).toBe(50);
    expect(sessionTimeoutMsByDefault()).toBe(1_000);
    expect(marginTargetByDefault()).toBe(0.2);
  });

  it('falls back on values that are not positive numbers', () => {
    process.env.NEG_MAX_ROUNDS = 'many';
    process.env.NEG_ACCEPTANCE_THRESHOLD = '-1';

    expect(maxRoundsByDefault()).toBe(10);
    expect(acceptanceThresholdByDefault()).toBe(0.02);
  });

  it('allows disabling agent backoff explicitly', () => {
    process.env.NEG_AGENT_BACKOFF_MS = '0';
    expect(agentBackoffMsByDefault()).toBe(0);
  });

  it('treats only "false" as switching a flag off', () => {
    process.env.NEG_AUTOMATION_EXPIRY_ENABLED = 'FALSE';
    expect(expiryAutomationEnabledByDefault()).toBe(false);

    process.env.NEG_AUTOMATION_EXPIRY_ENABLED = 'no';
    expect(expiryAutomationEnabledByDefault()).toBe(true);
  });

  it('summarises the effective policy', () => {
    process.env.NEG_MARKET_SOURCE_URLS = 'https://listings.example.test, ,https://auctions.example.test';
    expect(policySnapshot()).toMatchObject({ reasoningBackend: 'rules', marketSourcesConfigured: 2 });

    process.env.NEG_REASONING_BACKEND_URL = 'http://reasoner.example.test';
    expect(policySnapshot().reasoningBackend).toBe('http');
  });
});
