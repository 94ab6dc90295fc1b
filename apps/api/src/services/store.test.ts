import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, describe, expect, it } from 'vitest';
import type { NegotiationRecord } from '../types/domain.js';
import { createStore, type Store } from './store.js';

const tempDirs: string[] = [];

function tempDbFile() {
  const dir = mkdtempSync(join(tmpdir(), 'autotrade-store-'));
  tempDirs.push(dir);
  return join(dir, 'test.sqlite');
}

afterEach(() => {
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

function seedParties(store: Store) {
  store.upsertVehicle({
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
    costBasis: 16500,
    listPrice: 21900
  });
  store.upsertVehicle({
    id: 'veh_focus',
    vin: 'WF0DXXGCBDHA00007',
    make: 'Ford',
    model: 'Focus',
    year: 2017,
    fuel: 'petrol',
    transmission: 'manual',
    mileage: 112000,
    condition: 'fair',
    marketValue: 8900,
    inStock: false
  });
  store.upsertClient({
    id: 'cli_test',
    firstName: 'Test',
    lastName: 'Buyer',
    budgetMin: 15000,
    budgetMax: 22000,
    preferredFuel: 'petrol',
    offerPreference: 'purchase',
    loyaltyScore: 0.7,
    riskScore: 0.1
  });
}

function negotiation(overrides: Partial<NegotiationRecord> = {}): NegotiationRecord {
  return {
    id: 'neg_1',
    status: 'in_progress',
    clientId: 'cli_test',
    tradeInVehicleId: 'veh_focus',
    targetVehicleId: 'veh_golf',
    marginTarget: 0.15,
    roundCount: 0,
    maxRounds: 10,
    reasoningTrace: [{ stage: 'market_analysis', summary: 'medium demand', at: '2026-01-01T00:00:00.000Z' }],
    marketSnapshotKey: 'volkswagen|golf|2021|petrol',
    marketDataDegraded: false,
    marketAnalysis: { demandLevel: 'medium' },
    tradeInEvaluation: { finalValue: 7329.73 },
    tradeInOfferedValue: 7329.73,
    offerAlternatives: [],
    startedAt: '2026-01-01T00:00:00.000Z',
    deadlineAt: '2026-01-01T00:05:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides
  };
}

describe('store', () => {
  it('persists catalog, negotiations, offers and rounds across reopen', () => {
    const dbFile = tempDbFile();

    {
      const store = createStore({ dbFile });
      seedParties(store);
      store.insertNegotiation(negotiation());
      store.insertOffer({
        id: 'neg_1_offer_1',
        negotiationId: 'neg_1',
        version: 1,
        roundNumber: 0,
        offerType: 'purchase',
        tradeInValue: 7329.73,
        purchasePrice: 22329.73,
        totalCost: 15000,
        benefits: { warrantyMonths: 24, maintenanceIncluded: false, roadsideAssistance: true, insuranceIncluded: false },
        confidence: 0.8,
        justification: 'opening',
        concession: false,
        lastConcession: false,
        budgetConflict: false,
        status: 'proposed',
        createdAt: '2026-01-01T00:00:00.000Z',
        updatedAt: '2026-01-01T00:00:00.000Z'
      });
      store.insertRound({
        id: 'neg_1_round_1',
        negotiationId: 'neg_1',
        roundNumber: 1,
        proposal: { purchasePrice: 22329.73 },
        reasoning: 'holding',
        feedback: 'too expensive',
        counterProposal: { price: 21000 },
        status: 'ongoing',
        decision: 'revised',
        gap: 0.0595,
        acceptanceLikelihood: 0.7025,
        recommendedAction: 'hold_firm',
        createdAt: '2026-01-01T00:01:00.000Z'
      });
      store.close();
    }

    {
      const store = createStore({ dbFile });

      expect(store.getVehicle('veh_golf')?.listPrice).toBe(21900);
      expect(store.getVehicle('veh_focus')?.costBasis).toBeUndefined();
      expect(store.listVehicles({ inStock: true }).map((item) => item.id)).toEqual(['veh_golf']);
      expect(store.getClient('cli_test')?.preferredFuel).toBe('petrol');

      const stored = store.getNegotiation('neg_1');
      expect(stored?.reasoningTrace).toHaveLength(1);
      expect(stored?.tradeInEvaluation).toEqual({ finalValue: 7329.73 });
      expect(stored?.finalPrice).toBeUndefined();

      expect(store.getOffer('neg_1_offer_1')?.benefits.roadsideAssistance).toBe(true);
      expect(store.getOffer('neg_1_offer_1')?.lastConcession).toBe(false);
      expect(stored?.offerAlternatives).toEqual([]);
      const [round] = store.listRounds('neg_1');
      expect(round?.counterProposal).toEqual({ price: 21000 });
      expect(round?.offerId).toBeUndefined();

      expect(store.counts()).toEqual({
        vehicles: 2,
        clients: 1,
        negotiations: 1,
        offers: 1,
        rounds: 1,
        marketSnapshots: 0
      });
      expect(store.stats()).toEqual({
        negotiationsByStatus: { in_progress: 1 },
        offersByStatus: { proposed: 1 }
      });
      store.close();
    }
  });

  it('merges negotiation patches without touching identity fields', () => {
    const store = createStore({ dbFile: tempDbFile() });
    seedParties(store);
    store.insertNegotiation(negotiation());

    const patched = store.patchNegotiation('neg_1', { status: 'concluded', finalPrice: 21000, outcomeReason: 'accepted' });

    expect(patched?.status).toBe('concluded');
    expect(patched?.finalPrice).toBe(21000);
    expect(patched?.clientId).toBe('cli_test');
    expect(patched?.tradeInOfferedValue).toBe(7329.73);
    expect(store.patchNegotiation('neg_missing', { status: 'failed' })).toBeUndefined();
    store.close();
  });

  it('lists only open negotiations past their deadline', () => {
    const store = createStore({ dbFile: tempDbFile() });
    seedParties(store);
    store.insertNegotiation(negotiation({ id: 'neg_overdue' }));
    store.insertNegotiation(negotiation({ id: 'neg_later', deadlineAt: '2026-01-01T01:00:00.000Z' }));
    store.insertNegotiation(negotiation({ id: 'neg_done', status: 'concluded' }));

    expect(store.listOverdueNegotiations('2026-01-01T00:10:00.000Z').map((item) => item.id)).toEqual(['neg_overdue']);
    expect(store.listNegotiations('concluded').map((item) => item.id)).toEqual(['neg_done']);
    store.close();
  });

  it('stores market snapshots by key', () => {
    const store = createStore({ dbFile: tempDbFile() });

    store.saveSnapshot({
      key: 'volkswagen|golf|2021|petrol',
      make: 'volkswagen',
      model: 'golf',
      year: 2021,
      fuel: 'petrol',
      avgPrice: 20000,
      minPrice: 18000,
      maxPrice: 23000,
      listingCount: 12,
      confidence: 0.8,
      computedAt: 1_767_225_600_000,
      fingerprint: 'sha256:abc',
      degraded: true
    });

    expect(store.loadSnapshot('volkswagen|golf|2021|petrol')).toMatchObject({
      avgPrice: 20000,
      computedAt: 1_767_225_600_000,
      degraded: false
    });
    expect(store.loadSnapshot('ford|focus|2017|petrol')).toBeUndefined();
    store.close();
  });

  it('rolls back a failed transaction', () => {
    const store = createStore({ dbFile: tempDbFile() });
    seedParties(store);

    expect(() =>
      store.transaction(() => {
        store.insertNegotiation(negotiation());
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(store.getNegotiation('neg_1')).toBeUndefined();
    store.close();
  });
});
