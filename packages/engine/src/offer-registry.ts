/**
 * offer-registry.ts — Offer intake while a tender is open, plus the offer read models.
 */

import type { Offer, OfferSummary } from '@tenderflow/shared';
import { isAfter } from 'date-fns';
import { authorize } from './access-control.js';
import type { AccessControl } from './access-control.js';
import type { Clock } from './clock.js';
import { alreadyExists, deadlineViolation, invalidInput, invalidState, notFound } from './errors.js';
import { scoreOffer } from './scoring.js';
import { toOffer } from './store.js';
import type { TenderStore } from './store.js';
import { isBlank, isIntegerInRange } from './validation.js';

export class OfferRegistry {
  constructor(
    private readonly store: TenderStore,
    private readonly access: AccessControl,
    private readonly clock: Clock,
  ) {}

  submitOffer(caller: string, tenderId: number, price: number, documentationRef: string): Offer {
    authorize(this.access, caller, 'submitOffer');

    const tender = this.store.requireTender(tenderId);
    if (tender.status !== 'open') {
      throw invalidState('tender is not accepting offers', { tenderId, status: tender.status });
    }
    const now = this.clock.now();
    if (isAfter(now, tender.deadline)) {
      throw deadlineViolation('offer deadline has passed', {
        tenderId,
        deadline: tender.deadline.toISOString(),
      });
    }
    if (!isIntegerInRange(price, 1, tender.maxPrice)) {
      throw invalidInput(`price must be an integer between 1 and ${tender.maxPrice}`, {
        tenderId,
        price,
      });
    }
    if (isBlank(documentationRef)) {
      throw invalidInput('documentation reference must not be empty', { tenderId });
    }
    if (this.store.findOffer(tenderId, caller)) {
      throw alreadyExists('provider has already submitted an offer', { tenderId, provider: caller });
    }

    const record = {
      tenderId,
      provider: caller,
      price,
      documentationRef,
      qualityScore: 0,
      evaluated: false,
      submittedAt: now,
    };
    this.store.appendOffer(record);
    return toOffer(record);
  }

  getOffer(tenderId: number, provider: string): Offer {
    this.store.requireTender(tenderId);
    const offer = this.store.findOffer(tenderId, provider);
    if (!offer) {
      throw notFound('offer does not exist', { tenderId, provider });
    }
    return toOffer(offer);
  }

  getOffers(tenderId: number): OfferSummary {
    const tender = this.store.requireTender(tenderId);
    const summary: OfferSummary = {
      providers: [],
      prices: [],
      quality_scores: [],
      combined_scores: [],
    };
    for (const offer of this.store.offersOf(tenderId)) {
      const scored = scoreOffer(tender, offer);
      summary.providers.push(offer.provider);
      summary.prices.push(offer.price);
      summary.quality_scores.push(offer.qualityScore);
      summary.combined_scores.push(scored.combinedScore);
    }
    return summary;
  }

  getParticipants(tenderId: number): string[] {
    this.store.requireTender(tenderId);
    return [...this.store.participantsOf(tenderId)];
  }
}
