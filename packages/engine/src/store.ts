/**
 * store.ts — Append-only in-memory entity store for tenders, offers and participants.
 *
 * Records handed out by the store are live; registries copy them into
 * `@tenderflow/shared` projections before anything leaves the engine.
 */

import type { Offer, Tender, TenderStatus } from '@tenderflow/shared';
import { notFound } from './errors.js';

export interface TenderRecord {
  id: number;
  creator: string;
  description: string;
  maxPrice: number;
  deadline: Date;
  weightPrice: number;
  weightQuality: number;
  status: TenderStatus;
  winner: string | null;
  createdAt: Date;
}

export interface OfferRecord {
  tenderId: number;
  provider: string;
  price: number;
  documentationRef: string;
  qualityScore: number;
  evaluated: boolean;
  submittedAt: Date;
}

export type NewTenderRecord = Omit<TenderRecord, 'id' | 'status' | 'winner'>;

export class TenderStore {
  private nextId = 1;
  private readonly tenders = new Map<number, TenderRecord>();
  /** tenderId → provider → offer. Presence in the inner map is what "offer exists" means. */
  private readonly offers = new Map<number, Map<string, OfferRecord>>();
  private readonly participants = new Map<number, string[]>();

  insertTender(fields: NewTenderRecord): TenderRecord {
    const record: TenderRecord = { ...fields, id: this.nextId, status: 'open', winner: null };
    this.tenders.set(record.id, record);
    this.offers.set(record.id, new Map());
    this.participants.set(record.id, []);
    this.nextId += 1;
    return record;
  }

  requireTender(tenderId: number): TenderRecord {
    const tender = this.tenders.get(tenderId);
    if (!tender) {
      throw notFound(`tender ${tenderId} does not exist`, { tenderId });
    }
    return tender;
  }

  tenderCount(): number {
    return this.tenders.size;
  }

  allTenders(): TenderRecord[] {
    return [...this.tenders.values()];
  }

  findOffer(tenderId: number, provider: string): OfferRecord | undefined {
    return this.offers.get(tenderId)?.get(provider);
  }

  /** Stores the offer and appends its provider to the participant list in one step. */
  appendOffer(record: OfferRecord): void {
    const byProvider = this.offers.get(record.tenderId);
    const participants = this.participants.get(record.tenderId);
    if (!byProvider || !participants) {
      throw notFound(`tender ${record.tenderId} does not exist`, { tenderId: record.tenderId });
    }
    byProvider.set(record.provider, record);
    participants.push(record.provider);
  }

  participantsOf(tenderId: number): readonly string[] {
    return this.participants.get(tenderId) ?? [];
  }

  /** Offers in submission order. */
  offersOf(tenderId: number): OfferRecord[] {
    const byProvider = this.offers.get(tenderId);
    if (!byProvider) return [];
    return this.participantsOf(tenderId).flatMap((provider) => {
      const offer = byProvider.get(provider);
      return offer ? [offer] : [];
    });
  }
}

// ---------------------------------------------------------------------------
// Projections
// ---------------------------------------------------------------------------

export function toTender(record: TenderRecord, participantCount: number): Tender {
  return {
    id: record.id,
    creator: record.creator,
    description: record.description,
    max_price: record.maxPrice,
    deadline: record.deadline.toISOString(),
    weight_price: record.weightPrice,
    weight_quality: record.weightQuality,
    status: record.status,
    winner: record.winner,
    participant_count: participantCount,
    created_at: record.createdAt.toISOString(),
  };
}

export function toOffer(record: OfferRecord): Offer {
  return {
    tender_id: record.tenderId,
    provider: record.provider,
    price: record.price,
    documentation_ref: record.documentationRef,
    quality_score: record.qualityScore,
    evaluated: record.evaluated,
    submitted_at: record.submittedAt.toISOString(),
  };
}
