import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type {
  ClientRecord,
  CounterProposal,
  MarketSnapshot,
  NegotiationOutcomeReason,
  NegotiationRecord,
  NegotiationRoundRecord,
  NegotiationStatus,
  OfferBenefits,
  OfferRecord,
  OfferStatus,
  OfferTerms,
  OfferType,
  RecommendedAction,
  RoundDecision,
  RoundStatus,
  VehicleRecord
} from '../types/domain.js';
import type { Catalog } from './catalog.js';
import type { SnapshotRepository } from './marketCache.js';
import { nowIso } from '../utils/time.js';

export type VehicleInput = Omit<VehicleRecord, 'createdAt' | 'updatedAt' | 'inStock'> & { inStock?: boolean };

export type ClientInput = Omit<ClientRecord, 'createdAt' | 'updatedAt' | 'offerPreference' | 'loyaltyScore' | 'riskScore'> & {
  offerPreference?: ClientRecord['offerPreference'];
  loyaltyScore?: number;
  riskScore?: number;
};

export type NegotiationPatch = Partial<Omit<NegotiationRecord, 'id' | 'startedAt' | 'clientId' | 'targetVehicleId'>>;

export type OfferPatch = Partial<Pick<OfferRecord, 'status' | 'supersededById'>>;

export type Store = Catalog & SnapshotRepository & {
  file: string;
  close(): void;
  transaction<T>(work: () => T): T;

  listClients(): ClientRecord[];
  upsertVehicle(input: VehicleInput): VehicleRecord;
  upsertClient(input: ClientInput): ClientRecord;

  listNegotiations(status?: NegotiationStatus): NegotiationRecord[];
  listOverdueNegotiations(now: string): NegotiationRecord[];
  getNegotiation(id: string): NegotiationRecord | undefined;
  insertNegotiation(record: NegotiationRecord): NegotiationRecord;
  patchNegotiation(id: string, patch: NegotiationPatch): NegotiationRecord | undefined;

  insertOffer(record: OfferRecord): OfferRecord;
  getOffer(id: string): OfferRecord | undefined;
  patchOffer(id: string, patch: OfferPatch): OfferRecord | undefined;
  listOffers(negotiationId: string): OfferRecord[];

  insertRound(record: NegotiationRoundRecord): NegotiationRoundRecord;
  listRounds(negotiationId: string): NegotiationRoundRecord[];

  counts(): {
    vehicles: number;
    clients: number;
    negotiations: number;
    offers: number;
    rounds: number;
    marketSnapshots: number;
  };
  stats(): { negotiationsByStatus: Record<string, number>; offersByStatus: Record<string, number> };
};

type StoreOptions = {
  dbFile?: string;
};

type Row = Record<string, unknown>;

function parseJson<T>(value: unknown, fallback: T): T {
  if (typeof value !== 'string' || value.trim() === '') return fallback;
  try {
    return JSON.parse(value) as T;
  } catch {
    return fallback;
  }
}

function optionalNumber(value: unknown): number | undefined {
  return value == null ? undefined : Number(value);
}

function optionalString(value: unknown): string | undefined {
  return value == null || value === '' ? undefined : String(value);
}

function toVehicle(row: Row): VehicleRecord {
  return {
    id: String(row.id),
    vin: String(row.vin),
    make: String(row.make),
    model: String(row.model),
    year: Number(row.year),
    fuel: row.fuel as VehicleRecord['fuel'],
    transmission: row.transmission as VehicleRecord['transmission'],
    mileage: Number(row.mileage),
    condition: row.condition as VehicleRecord['condition'],
    marketValue: Number(row.market_value),
    costBasis: optionalNumber(row.cost_basis),
    listPrice: optionalNumber(row.list_price),
    inStock: Number(row.in_stock) === 1,
    createdAt: String(row.created_at),
    updatedAt: String(row.updated_at)
  };
}

function toClient(row: Row): ClientRecord {
  return {
    id: String(row.id),
    firstName: String(row.first_name),
    lastName: String(row.last_name),
    email: optionalString(row.email),
    budgetMin: Number(row.budget_min),
    budgetMax: Number(row.budget_max),
    preferredFuel: optionalString(row.preferred_fuel) as ClientRecord['preferredFuel'],
    preferredTransmission: optionalString(row.preferred_transmission) as ClientRecord['preferredTransmission'],
    offerPreference: row.offer_preference as ClientRecord['offerPreference'],
    loyaltyScore: Number(row.loyalty_score),
    riskScore: Number(row.risk_score),
    createdAt: String(row.created_at),
    updatedAt: String(row.updated_at)
  };
}

function toSnapshot(row: Row): MarketSnapshot {
  return {
    key: String(row.key),
    make: String(row.make),
    model: String(row.model),
    year: Number(row.year),
    fuel: String(row.fuel),
    avgPrice: Number(row.avg_price),
    minPrice: Number(row.min_price),
    maxPrice: Number(row.max_price),
    listingCount: Number(row.listing_count),
    confidence: Number(row.confidence),
    computedAt: Number(row.computed_at),
    fingerprint: String(row.fingerprint),
    degraded: false
  };
}

function toNegotiation(row: Row): NegotiationRecord {
  return {
    id: String(row.id),
    status: row.status as NegotiationStatus,
    clientId: String(row.client_id),
    tradeInVehicleId: optionalString(row.trade_in_vehicle_id),
    targetVehicleId: String(row.target_vehicle_id),
    marginTarget: Number(row.margin_target),
    roundCount: Number(row.round_count),
    maxRounds: Number(row.max_rounds),
    reasoningTrace: parseJson<NegotiationRecord['reasoningTrace']>(row.reasoning_trace_json, []),
    marketSnapshotKey: String(row.market_snapshot_key),
    marketDataDegraded: Number(row.market_data_degraded) === 1,
    marketAnalysis: parseJson<Record<string, unknown>>(row.market_analysis_json, {}),
    tradeInEvaluation: parseJson<Record<string, unknown> | undefined>(row.trade_in_evaluation_json, undefined),
    tradeInOfferedValue: optionalNumber(row.trade_in_offered_value),
    offerAlternatives: parseJson<OfferTerms[]>(row.offer_alternatives_json, []),
    finalPrice: optionalNumber(row.final_price),
    marginAchieved: optionalNumber(row.margin_achieved),
    chosenOfferType: optionalString(row.chosen_offer_type) as OfferType | undefined,
    outcomeReason: optionalString(row.outcome_reason) as NegotiationOutcomeReason | undefined,
    startedAt: String(row.started_at),
    deadlineAt: String(row.deadline_at),
    endedAt: optionalString(row.ended_at),
    updatedAt: String(row.updated_at)
  };
}

function toOffer(row: Row): OfferRecord {
  return {
    id: String(row.id),
    negotiationId: String(row.negotiation_id),
    version: Number(row.version),
    roundNumber: Number(row.round_number),
    offerType: row.offer_type as OfferType,
    tradeInValue: Number(row.trade_in_value),
    purchasePrice: optionalNumber(row.purchase_price),
    monthlyPayment: optionalNumber(row.monthly_payment),
    durationMonths: optionalNumber(row.duration_months),
    totalCost: Number(row.total_cost),
    benefits: parseJson<OfferBenefits>(row.benefits_json, {
      warrantyMonths: 0,
      maintenanceIncluded: false,
      roadsideAssistance: false,
      insuranceIncluded: false
    }),
    confidence: Number(row.confidence),
    justification: String(row.justification),
    concession: Number(row.concession) === 1,
    lastConcession: Number(row.last_concession) === 1,
    budgetConflict: Number(row.budget_conflict) === 1,
    status: row.status as OfferStatus,
    supersededById: optionalString(row.superseded_by_id),
    createdAt: String(row.created_at),
    updatedAt: String(row.updated_at)
  };
}

function toRound(row: Row): NegotiationRoundRecord {
  return {
    id: String(row.id),
    negotiationId: String(row.negotiation_id),
    roundNumber: Number(row.round_number),
    proposal: parseJson<Record<string, unknown>>(row.proposal_json, {}),
    reasoning: String(row.reasoning),
    feedback: String(row.feedback),
    counterProposal: parseJson<CounterProposal | undefined>(row.counter_proposal_json, undefined),
    status: row.status as RoundStatus,
    decision: row.decision as RoundDecision,
    gap: Number(row.gap),
    acceptanceLikelihood: Number(row.acceptance_likelihood),
    recommendedAction: row.recommended_action as RecommendedAction,
    offerId: optionalString(row.offer_id),
    createdAt: String(row.created_at)
  };
}

function ensureSchema(db: Database.Database) {
  db.exec(`
    PRAGMA journal_mode = WAL;
    PRAGMA foreign_keys = ON;

    CREATE TABLE IF NOT EXISTS vehicles (
      id TEXT PRIMARY KEY,
      vin TEXT NOT NULL UNIQUE,
      make TEXT NOT NULL,
      model TEXT NOT NULL,
      year INTEGER NOT NULL,
      fuel TEXT NOT NULL,
      transmission TEXT NOT NULL,
      mileage INTEGER NOT NULL,
      condition TEXT NOT NULL,
      market_value REAL NOT NULL,
      cost_basis REAL,
      list_price REAL,
      in_stock INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS clients (
      id TEXT PRIMARY KEY,
      first_name TEXT NOT NULL,
      last_name TEXT NOT NULL,
      email TEXT,
      budget_min REAL NOT NULL,
      budget_max REAL NOT NULL,
      preferred_fuel TEXT,
      preferred_transmission TEXT,
      offer_preference TEXT NOT NULL DEFAULT 'flexible',
      loyalty_score REAL NOT NULL DEFAULT 0,
      risk_score REAL NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS market_snapshots (
      key TEXT PRIMARY KEY,
      make TEXT NOT NULL,
      model TEXT NOT NULL,
      year INTEGER NOT NULL,
      fuel TEXT NOT NULL,
      avg_price REAL NOT NULL,
      min_price REAL NOT NULL,
      max_price REAL NOT NULL,
      listing_count INTEGER NOT NULL,
      confidence REAL NOT NULL,
      computed_at INTEGER NOT NULL,
      fingerprint TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS negotiations (
      id TEXT PRIMARY KEY,
      status TEXT NOT NULL,
      client_id TEXT NOT NULL,
      trade_in_vehicle_id TEXT,
      target_vehicle_id TEXT NOT NULL,
      margin_target REAL NOT NULL,
      round_count INTEGER NOT NULL DEFAULT 0,
      max_rounds INTEGER NOT NULL,
      reasoning_trace_json TEXT NOT NULL,
      market_snapshot_key TEXT NOT NULL,
      market_data_degraded INTEGER NOT NULL DEFAULT 0,
      market_analysis_json TEXT NOT NULL,
      trade_in_evaluation_json TEXT,
      trade_in_offered_value REAL,
      offer_alternatives_json TEXT NOT NULL,
      final_price REAL,
      margin_achieved REAL,
      chosen_offer_type TEXT,
      outcome_reason TEXT,
      started_at TEXT NOT NULL,
      deadline_at TEXT NOT NULL,
      ended_at TEXT,
      updated_at TEXT NOT NULL,
      FOREIGN KEY (client_id) REFERENCES clients(id),
      FOREIGN KEY (trade_in_vehicle_id) REFERENCES vehicles(id),
      FOREIGN KEY (target_vehicle_id) REFERENCES vehicles(id)
    );

    CREATE TABLE IF NOT EXISTS offers (
      id TEXT PRIMARY KEY,
      negotiation_id TEXT NOT NULL,
      version INTEGER NOT NULL,
      round_number INTEGER NOT NULL,
      offer_type TEXT NOT NULL,
      trade_in_value REAL NOT NULL,
      purchase_price REAL,
      monthly_payment REAL,
      duration_months INTEGER,
      total_cost REAL NOT NULL,
      benefits_json TEXT NOT NULL,
      confidence REAL NOT NULL,
      justification TEXT NOT NULL,
      concession INTEGER NOT NULL DEFAULT 0,
      last_concession INTEGER NOT NULL DEFAULT 0,
      budget_conflict INTEGER NOT NULL DEFAULT 0,
      status TEXT NOT NULL,
      superseded_by_id TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      UNIQUE (negotiation_id, version),
      FOREIGN KEY (negotiation_id) REFERENCES negotiations(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS negotiation_rounds (
      id TEXT PRIMARY KEY,
      negotiation_id TEXT NOT NULL,
      round_number INTEGER NOT NULL,
      proposal_json TEXT NOT NULL,
      reasoning TEXT NOT NULL,
      feedback TEXT NOT NULL,
      counter_proposal_json TEXT,
      status TEXT NOT NULL,
      decision TEXT NOT NULL,
      gap REAL NOT NULL,
      acceptance_likelihood REAL NOT NULL,
      recommended_action TEXT NOT NULL,
      offer_id TEXT,
      created_at TEXT NOT NULL,
      UNIQUE (negotiation_id, round_number),
      FOREIGN KEY (negotiation_id) REFERENCES negotiations(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_vehicles_in_stock ON vehicles(in_stock);
    CREATE INDEX IF NOT EXISTS idx_negotiations_status ON negotiations(status);
    CREATE INDEX IF NOT EXISTS idx_negotiations_deadline ON negotiations(deadline_at);
    CREATE INDEX IF NOT EXISTS idx_offers_negotiation_version ON offers(negotiation_id, version);
    CREATE INDEX IF NOT EXISTS idx_rounds_negotiation_round ON negotiation_rounds(negotiation_id, round_number);
  `);
}

function countOf(db: Database.Database, table: string): number {
  return Number((db.prepare(`SELECT COUNT(*) as c FROM ${table}`).get() as { c: number }).c);
}

function groupByStatus(db: Database.Database, table: string): Record<string, number> {
  const rows = db.prepare(`SELECT status, COUNT(*) as c FROM ${table} GROUP BY status`).all() as {
    status: string;
    c: number;
  }[];

  const result: Record<string, number> = {};
  for (const row of rows) {
    result[row.status] = row.c;
  }
  return result;
}

function stored<T>(value: T | undefined, what: string): T {
  if (value === undefined) throw new Error(`${what}_not_persisted`);
  return value;
}

export function createStore(options: StoreOptions = {}): Store {
  const file = options.dbFile || process.env.NEG_DB_FILE || '.data/autotrade-negotiation.sqlite';
  mkdirSync(dirname(file), { recursive: true });

  const db = new Database(file);
  ensureSchema(db);

  const store: Store = {
    file,

    close() {
      db.close();
    },

    transaction(work) {
      return db.transaction(work)();
    },

    getVehicle(id) {
      const row = db.prepare('SELECT * FROM vehicles WHERE id = ?').get(id) as Row | undefined;
      return row ? toVehicle(row) : undefined;
    },

    listVehicles(filter) {
      const rows = (
        filter?.inStock === undefined
          ? db.prepare('SELECT * FROM vehicles ORDER BY make, model, year DESC, id').all()
          : db.prepare('SELECT * FROM vehicles WHERE in_stock = ? ORDER BY make, model, year DESC, id').all(filter.inStock ? 1 : 0)
      ) as Row[];

      return rows.map(toVehicle);
    },

    upsertVehicle(input) {
      const now = nowIso();
      const existing = store.getVehicle(input.id);

      db.prepare(`
        INSERT INTO vehicles (
          id, vin, make, model, year, fuel, transmission, mileage, condition,
          market_value, cost_basis, list_price, in_stock, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          vin = excluded.vin,
          make = excluded.make,
          model = excluded.model,
          year = excluded.year,
          fuel = excluded.fuel,
          transmission = excluded.transmission,
          mileage = excluded.mileage,
          condition = excluded.condition,
          market_value = excluded.market_value,
          cost_basis = excluded.cost_basis,
          list_price = excluded.list_price,
          in_stock = excluded.in_stock,
          updated_at = excluded.updated_at
      `).run(
        input.id,
        input.vin,
        input.make,
        input.model,
        input.year,
        input.fuel,
        input.transmission,
        input.mileage,
        input.condition,
        input.marketValue,
        input.costBasis ?? null,
        input.listPrice ?? null,
        input.inStock === false ? 0 : 1,
        existing?.createdAt ?? now,
        now
      );

      return stored(store.getVehicle(input.id), 'vehicle');
    },

    getClient(id) {
      const row = db.prepare('SELECT * FROM clients WHERE id = ?').get(id) as Row | undefined;
      return row ? toClient(row) : undefined;
    },

    listClients() {
      const rows = db.prepare('SELECT * FROM clients ORDER BY last_name, first_name, id').all() as Row[];
      return rows.map(toClient);
    },

    upsertClient(input) {
      const now = nowIso();
      const existing = store.getClient(input.id);

      db.prepare(`
        INSERT INTO clients (
          id, first_name, last_name, email, budget_min, budget_max, preferred_fuel,
          preferred_transmission, offer_preference, loyalty_score, risk_score, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          first_name = excluded.first_name,
          last_name = excluded.last_name,
          email = excluded.email,
          budget_min = excluded.budget_min,
          budget_max = excluded.budget_max,
          preferred_fuel = excluded.preferred_fuel,
          preferred_transmission = excluded.preferred_transmission,
          offer_preference = excluded.offer_preference,
          loyalty_score = excluded.loyalty_score,
          risk_score = excluded.risk_score,
          updated_at = excluded.updated_at
      `).run(
        input.id,
        input.firstName,
        input.lastName,
        input.email ?? null,
        input.budgetMin,
        input.budgetMax,
        input.preferredFuel ?? null,
        input.preferredTransmission ?? null,
        input.offerPreference ?? 'flexible',
        input.loyaltyScore ?? 0,
        input.riskScore ?? 0,
        existing?.createdAt ?? now,
        now
      );

      return stored(store.getClient(input.id), 'client');
    },

    loadSnapshot(key) {
      const row = db.prepare('SELECT * FROM market_snapshots WHERE key = ?').get(key) as Row | undefined;
      return row ? toSnapshot(row) : undefined;
    },

    saveSnapshot(snapshot) {
      db.prepare(`
        INSERT INTO market_snapshots (
          key, make, model, year, fuel, avg_price, min_price, max_price,
          listing_count, confidence, computed_at, fingerprint
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET
          avg_price = excluded.avg_price,
          min_price = excluded.min_price,
          max_price = excluded.max_price,
          listing_count = excluded.listing_count,
          confidence = excluded.confidence,
          computed_at = excluded.computed_at,
          fingerprint = excluded.fingerprint
      `).run(
        snapshot.key,
        snapshot.make,
        snapshot.model,
        snapshot.year,
        snapshot.fuel,
        snapshot.avgPrice,
        snapshot.minPrice,
        snapshot.maxPrice,
        snapshot.listingCount,
        snapshot.confidence,
        snapshot.computedAt,
        snapshot.fingerprint
      );
    },

    listNegotiations(status) {
      const rows = (
        status
          ? db.prepare('SELECT * FROM negotiations WHERE status = ? ORDER BY started_at DESC, id').all(status)
          : db.prepare('SELECT * FROM negotiations ORDER BY started_at DESC, id').all()
      ) as Row[];

      return rows.map(toNegotiation);
    },

    listOverdueNegotiations(now) {
      const rows = db.prepare(`
        SELECT * FROM negotiations
        WHERE status IN ('initiated', 'in_progress', 'pending_approval') AND deadline_at <= ?
        ORDER BY deadline_at ASC
      `).all(now) as Row[];

      return rows.map(toNegotiation);
    },

    getNegotiation(id) {
      const row = db.prepare('SELECT * FROM negotiations WHERE id = ?').get(id) as Row | undefined;
      return row ? toNegotiation(row) : undefined;
    },

    insertNegotiation(record) {
      db.prepare(`
        INSERT INTO negotiations (
          id, status, client_id, trade_in_vehicle_id, target_vehicle_id, margin_target,
          round_count, max_rounds, reasoning_trace_json, market_snapshot_key, market_data_degraded,
          market_analysis_json, trade_in_evaluation_json, trade_in_offered_value, offer_alternatives_json,
          final_price, margin_achieved, chosen_offer_type, outcome_reason,
          started_at, deadline_at, ended_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        record.id,
        record.status,
        record.clientId,
        record.tradeInVehicleId ?? null,
        record.targetVehicleId,
        record.marginTarget,
        record.roundCount,
        record.maxRounds,
        JSON.stringify(record.reasoningTrace),
        record.marketSnapshotKey,
        record.marketDataDegraded ? 1 : 0,
        JSON.stringify(record.marketAnalysis),
        record.tradeInEvaluation ? JSON.stringify(record.tradeInEvaluation) : null,
        record.tradeInOfferedValue ?? null,
        JSON.stringify(record.offerAlternatives),
        record.finalPrice ?? null,
        record.marginAchieved ?? null,
        record.chosenOfferType ?? null,
        record.outcomeReason ?? null,
        record.startedAt,
        record.deadlineAt,
        record.endedAt ?? null,
        record.updatedAt
      );

      return stored(store.getNegotiation(record.id), 'negotiation');
    },

    patchNegotiation(id, patch) {
      const existing = store.getNegotiation(id);
      if (!existing) return undefined;

      const next: NegotiationRecord = {
        ...existing,
        ...patch,
        id,
        startedAt: existing.startedAt,
        clientId: existing.clientId,
        targetVehicleId: existing.targetVehicleId,
        updatedAt: patch.updatedAt ?? nowIso()
      };

      db.prepare(`
        UPDATE negotiations SET
          status = ?,
          trade_in_vehicle_id = ?,
          margin_target = ?,
          round_count = ?,
          max_rounds = ?,
          reasoning_trace_json = ?,
          market_snapshot_key = ?,
          market_data_degraded = ?,
          market_analysis_json = ?,
          trade_in_evaluation_json = ?,
          trade_in_offered_value = ?,
          offer_alternatives_json = ?,
          final_price = ?,
          margin_achieved = ?,
          chosen_offer_type = ?,
          outcome_reason = ?,
          deadline_at = ?,
          ended_at = ?,
          updated_at = ?
        WHERE id = ?
      `).run(
        next.status,
        next.tradeInVehicleId ?? null,
        next.marginTarget,
        next.roundCount,
        next.maxRounds,
        JSON.stringify(next.reasoningTrace),
        next.marketSnapshotKey,
        next.marketDataDegraded ? 1 : 0,
        JSON.stringify(next.marketAnalysis),
        next.tradeInEvaluation ? JSON.stringify(next.tradeInEvaluation) : null,
        next.tradeInOfferedValue ?? null,
        JSON.stringify(next.offerAlternatives),
        next.finalPrice ?? null,
        next.marginAchieved ?? null,
        next.chosenOfferType ?? null,
        next.outcomeReason ?? null,
        next.deadlineAt,
        next.endedAt ?? null,
        next.updatedAt,
        id
      );

      return store.getNegotiation(id);
    },

    insertOffer(record) {
      db.prepare(`
        INSERT INTO offers (
          id, negotiation_id, version, round_number, offer_type, trade_in_value, purchase_price,
          monthly_payment, duration_months, total_cost, benefits_json, confidence, justification,
          concession, last_concession, budget_conflict, status, superseded_by_id, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        record.id,
        record.negotiationId,
        record.version,
        record.roundNumber,
        record.offerType,
        record.tradeInValue,
        record.purchasePrice ?? null,
        record.monthlyPayment ?? null,
        record.durationMonths ?? null,
        record.totalCost,
        JSON.stringify(record.benefits),
        record.confidence,
        record.justification,
        record.concession ? 1 : 0,
        record.lastConcession ? 1 : 0,
        record.budgetConflict ? 1 : 0,
        record.status,
        record.supersededById ?? null,
        record.createdAt,
        record.updatedAt
      );

      return stored(store.getOffer(record.id), 'offer');
    },

    getOffer(id) {
      const row = db.prepare('SELECT * FROM offers WHERE id = ?').get(id) as Row | undefined;
      return row ? toOffer(row) : undefined;
    },

    patchOffer(id, patch) {
      const existing = store.getOffer(id);
      if (!existing) return undefined;

      const status = patch.status ?? existing.status;
      const supersededById = patch.supersededById ?? existing.supersededById;

      db.prepare('UPDATE offers SET status = ?, superseded_by_id = ?, updated_at = ? WHERE id = ?').run(
        status,
        supersededById ?? null,
        nowIso(),
        id
      );

      return store.getOffer(id);
    },

    listOffers(negotiationId) {
      const rows = db
        .prepare('SELECT * FROM offers WHERE negotiation_id = ? ORDER BY version ASC')
        .all(negotiationId) as Row[];

      return rows.map(toOffer);
    },

    insertRound(record) {
      db.prepare(`
        INSERT INTO negotiation_rounds (
          id, negotiation_id, round_number, proposal_json, reasoning, feedback, counter_proposal_json,
          status, decision, gap, acceptance_likelihood, recommended_action, offer_id, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        record.id,
        record.negotiationId,
        record.roundNumber,
        JSON.stringify(record.proposal),
        record.reasoning,
        record.feedback,
        record.counterProposal ? JSON.stringify(record.counterProposal) : null,
        record.status,
        record.decision,
        record.gap,
        record.acceptanceLikelihood,
        record.recommendedAction,
        record.offerId ?? null,
        record.createdAt
      );

      const row = db
        .prepare('SELECT * FROM negotiation_rounds WHERE id = ?')
        .get(record.id) as Row | undefined;
      return toRound(stored(row, 'round'));
    },

    listRounds(negotiationId) {
      const rows = db
        .prepare('SELECT * FROM negotiation_rounds WHERE negotiation_id = ? ORDER BY round_number ASC')
        .all(negotiationId) as Row[];

      return rows.map(toRound);
    },

    counts() {
      return {
        vehicles: countOf(db, 'vehicles'),
        clients: countOf(db, 'clients'),
        negotiations: countOf(db, 'negotiations'),
        offers: countOf(db, 'offers'),
        rounds: countOf(db, 'negotiation_rounds'),
        marketSnapshots: countOf(db, 'market_snapshots')
      };
    },

    stats() {
      return {
        negotiationsByStatus: groupByStatus(db, 'negotiations'),
        offersByStatus: groupByStatus(db, 'offers')
      };
    }
  };

  return store;
}
