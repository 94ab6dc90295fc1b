import { afterEach, describe, expect, it, vi } from 'vitest';
import type { MarketSnapshot, VehicleRecord } from '../types/domain.js';
import { createHttpReasoningBackend, ReasoningBackendError, type MarketAnalysisContext } from './reasoningBackend.js';

const stamp = '2026-01-01T00:00:00.000Z';

const vehicle: VehicleRecord = {
  id: 'veh_golf',
  vin: 'WVWZZZAUZMW100001',
  make: 'Volkswagen',
  model: 'Golf',
  year: 2021,
  fuel: 'petrol',
  transmission: 'manual',
  mileage: 38000,
  condition: 'good',
  marketValue: 19800,
  inStock: true,
  createdAt: stamp,
  updatedAt: stamp
};

const snapshot: MarketSnapshot = {
  make: 'volkswagen',
  model: 'golf',
  year: 2021,
  fuel: 'petrol',
  avgPrice: 20000,
  minPrice: 18000,
  maxPrice: 23000,
  listingCount: 12,
  confidence: 0.8,
  key: 'volkswagen|golf|2021|petrol',
  computedAt: 0,
  fingerprint: 'sha256:test',
  degraded: false
};

const context: MarketAnalysisContext = { vehicle, snapshot };
const realFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = realFetch;
});

function backend() {
  return createHttpReasoningBackend({ baseUrl: 'http://reasoner.example.test/', token: 'test-secret' });
}

function signal() {
  return new AbortController().signal;
}

describe('createHttpReasoningBackend', () => {
  it('posts the role context and returns the raw payload', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(JSON.stringify({ demandLevel: 'medium' }), { status: 200 })
    );
    globalThis.fetch = fetchMock;

    await expect(backend().invoke('market_analysis', context, { signal: signal() })).resolves.toEqual({
      demandLevel: 'medium'
    });

    const [target, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(target)).toBe('http://reasoner.example.test/agents/market_analysis');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toMatchObject({
      protocol: 'autotrade-negotiation/agent-v1',
      role: 'market_analysis',
      context: { vehicle: { id: 'veh_golf' } }
    });
  });

  it('reports non-2xx responses as an unavailable backend', async () => {
    globalThis.fetch = vi.fn(async () => new Response('busy', { status: 503 }));

    const failure = backend().invoke('market_analysis', context, { signal: signal() });
    await expect(failure).rejects.toBeInstanceOf(ReasoningBackendError);
    await expect(failure).rejects.toMatchObject({ kind: 'backend_unavailable', message: 'market_analysis:http_503' });
  });

  it('reports network errors as an unavailable backend', async () => {
    globalThis.fetch = vi.fn(async () => {
      throw new Error('ECONNREFUSED');
    });

    await expect(backend().invoke('market_analysis', context, { signal: signal() })).rejects.toMatchObject({
      kind: 'backend_unavailable',
      message: 'market_analysis:ECONNREFUSED'
    });
  });

  it('reports a body that is not JSON as malformed output', async () => {
    globalThis.fetch = vi.fn(async () => new Response('<html>oops</html>', { status: 200 }));

    await expect(backend().invoke('market_analysis', context, { signal: signal() })).rejects.toMatchObject({
      kind: 'malformed_output',
      message: 'market_analysis:invalid_json'
    });
  });

  it('reports an aborted request as a timeout', async () => {
    globalThis.fetch = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const controller = new AbortController();
    const pending = backend().invoke('market_analysis', context, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: 'timeout', message: 'market_analysis:request_aborted' });
  });
});
