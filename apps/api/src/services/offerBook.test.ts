import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, describe, expect, it } from 'vitest';
import type { OfferTerms } from '../types/domain.js';
import { NotFoundError, OfferNotActiveError } from './errors.js';
import { OfferBook } from './offerBook.js';
import { createStore, type Store } from './store.js';

const tempDirs: string[] = [];
const openStores: Store[] = [];

function openStore(): Store {
  const dir = mkdtempSync(join(tmpdir(), 'autotrade-offers-'));
  tempDirs.push(dir);
  const store = createStore({ dbFile: join(dir, 'test.sqlite') });
  openStores.push(store);
  return store;
}

function withNegotiation(store: Store, id = 'neg_test'): string {
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
    marketValue: 19800
  });
  store.upsertClient({ id: 'cli_test', firstName: 'Test', lastName: 'Buyer', budgetMin: 15000, budgetMax: 22000 });
  store.insertNegotiation({
    id,
    status: 'in_progress',
    clientId: 'cli_test',
    targetVehicleId: 'veh_golf',
    marginTarget: 0.15,
    roundCount: 0,
    maxRounds: 10,
    reasoningTrace: [],
    marketSnapshotKey: 'volkswagen|golf|2021|petrol',
    marketDataDegraded: false,
    marketAnalysis: {},
    offerAlternatives: [],
    startedAt: '2026-01-01T00:00:00.000Z',
    deadlineAt: '2026-01-01T00:05:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z'
  });
  return id;
}

function terms(overrides: Partial<OfferTerms> = {}): OfferTerms {
  return {
    offerType: 'purchase',
    tradeInValue: 0,
    purchasePrice: 21900,
    benefits: { warrantyMonths: 24, maintenanceIncluded: false, roadsideAssistance: true, insuranceIncluded: false },
    confidence: 0.8,
    justification: 'opening',
    concession: false,
    budgetConflict: false,
    ...overrides
  };
}

afterEach(() => {
  for (const store of openStores.splice(0, openStores.length)) store.close();
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe('OfferBook', () => {
  it('versions proposals and supersedes the previous active offer', () => {
    const store = openStore();
    const negotiationId = withNegotiation(store);
    const book = new OfferBook(store);

    const first = book.propose(negotiationId, terms(), { roundNumber: 0 });
    const second = book.propose(negotiationId, terms({ purchasePrice: 21000 }), { roundNumber: 1 });

    expect(first.id).toBe('neg_test_offer_1');
    expect(second.id).toBe('neg_test_offer_2');
    expect(second.version).toBe(2);
    expect(second.status).toBe('proposed');

    const [stored1, stored2] = book.list(negotiationId);
    expect(stored1?.status).toBe('negotiating');
    expect(stored1?.supersededById).toBe('neg_test_offer_2');
    expect(stored1?.purchasePrice).toBe(21900);
    expect(stored2?.supersededById).toBeUndefined();
    expect(book.active(negotiationId)?.id).toBe('neg_test_offer_2');
  });

  it('records the net cost after the trade-in credit', () => {
    const store = openStore();
    const negotiationId = withNegotiation(store);
    const book = new OfferBook(store);

    const purchase = book.propose(negotiationId, terms({ tradeInValue: 5000 }), { roundNumber: 0 });
    expect(purchase.totalCost).toBe(16900);

    const lease = book.propose(
      negotiationId,
      terms({ offerType: 'lease', purchasePrice: undefined, monthlyPayment: 450, durationMonths: 48, tradeInValue: 1000 }),
      { roundNumber: 1, lastConcession: true }
    );
    expect(lease.totalCost).toBe(20600);
    expect(lease.lastConcession).toBe(true);
  });

  it('accepts only the active offer', () => {
    const store = openStore();
    const negotiationId = withNegotiation(store);
    const book = new OfferBook(store);

    const first = book.propose(negotiationId, terms(), { roundNumber: 0 });
    const second = book.propose(negotiationId, terms({ purchasePrice: 21000 }), { roundNumber: 1 });

    expect(() => book.accept(first.id)).toThrow(OfferNotActiveError);

    const accepted = book.accept(second.id);
    expect(accepted.status).toBe('accepted');
    expect(book.active(negotiationId)).toBeUndefined();
  });

  it('rejects open offers once', () => {
    const store = openStore();
    const negotiationId = withNegotiation(store);
    const book = new OfferBook(store);

    const offer = book.propose(negotiationId, terms(), { roundNumber: 0 });
    expect(book.reject(offer.id).status).toBe('rejected');
    expect(() => book.reject(offer.id)).toThrow(OfferNotActiveError);
    expect(book.active(negotiationId)).toBeUndefined();
  });

  it('reports unknown offers as not found', () => {
    const book = new OfferBook(openStore());
    expect(() => book.reject('neg_missing_offer_1')).toThrow(NotFoundError);
  });
});
