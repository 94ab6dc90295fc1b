import type { OfferRecord, OfferTerms } from '../types/domain.js';
import { NotFoundError, OfferNotActiveError } from './errors.js';
import { netPrice } from './pricing.js';
import type { Store } from './store.js';
import { generateOfferId } from '../utils/ids.js';
import { nowIso } from '../utils/time.js';

export type ProposeOptions = {
  roundNumber: number;
  lastConcession?: boolean;
};

function isOpen(offer: OfferRecord): boolean {
  return offer.status === 'proposed' || offer.status === 'negotiating';
}

/**
 * Versioned offers of each negotiation. Terms are never edited: a revision is
 * a new version that supersedes the previous active one. Callers own the
 * surrounding transaction.
 */
export class OfferBook {
  constructor(private readonly store: Store) {}

  list(negotiationId: string): OfferRecord[] {
    return this.store.listOffers(negotiationId);
  }

  active(negotiationId: string): OfferRecord | undefined {
    const offers = this.store.listOffers(negotiationId);
    for (let index = offers.length - 1; index >= 0; index -= 1) {
      const offer = offers[index];
      if (offer && !offer.supersededById && isOpen(offer)) return offer;
    }
    return undefined;
  }

  propose(negotiationId: string, terms: OfferTerms, options: ProposeOptions): OfferRecord {
    const offers = this.store.listOffers(negotiationId);
    const version = offers.reduce((max, offer) => Math.max(max, offer.version), 0) + 1;
    const previous = this.active(negotiationId);
    const now = nowIso();
    const id = generateOfferId(negotiationId, version);

    const created = this.store.insertOffer({
      ...terms,
      benefits: { ...terms.benefits },
      id,
      negotiationId,
      version,
      roundNumber: options.roundNumber,
      totalCost: netPrice(terms),
      lastConcession: options.lastConcession ?? false,
      status: 'proposed',
      createdAt: now,
      updatedAt: now
    });

    if (previous) {
      this.store.patchOffer(previous.id, { status: 'negotiating', supersededById: id });
    }

    return created;
  }

  /** Accepts the active offer of its negotiation; any other offer is refused. */
  accept(offerId: string): OfferRecord {
    const offer = this.require(offerId);
    const active = this.active(offer.negotiationId);
    if (!active || active.id !== offer.id) {
      throw new OfferNotActiveError('Only the active offer can be accepted', {
        offerId,
        status: offer.status,
        activeOfferId: active?.id
      });
    }

    return this.markStatus(offer.id, 'accepted');
  }

  reject(offerId: string): OfferRecord {
    const offer = this.require(offerId);
    if (!isOpen(offer)) {
      throw new OfferNotActiveError('Offer is no longer open', { offerId, status: offer.status });
    }

    return this.markStatus(offer.id, 'rejected');
  }

  require(offerId: string): OfferRecord {
    const offer = this.store.getOffer(offerId);
    if (!offer) throw new NotFoundError('Offer not found', { offerId });
    return offer;
  }

  private markStatus(offerId: string, status: OfferRecord['status']): OfferRecord {
    const updated = this.store.patchOffer(offerId, { status });
    if (!updated) throw new NotFoundError('Offer not found', { offerId });
    return updated;
  }
}
