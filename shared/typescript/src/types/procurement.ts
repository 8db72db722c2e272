/**
 * types/procurement.ts — Tender and offer projections as returned over the API.
 */

/** Lifecycle phase of a tender. Transitions only ever move forward. */
export type TenderStatus = 'open' | 'closed' | 'evaluated' | 'finalized';

export interface Tender {
  id: number;
  creator: string;
  description: string;
  max_price: number;
  deadline: string;           // ISO 8601
  weight_price: number;       // 0-100
  weight_quality: number;     // 0-100, weight_price + weight_quality = 100
  status: TenderStatus;
  winner: string | null;
  participant_count: number;
  created_at: string;
}

export interface Offer {
  tender_id: number;
  provider: string;
  price: number;
  documentation_ref: string;
  quality_score: number;      // meaningful only when evaluated
  evaluated: boolean;
  submitted_at: string;
}

/** Parallel sequences, all ordered by submission. */
export interface OfferSummary {
  providers: string[];
  prices: number[];
  quality_scores: number[];
  combined_scores: number[];
}

export interface RankingEntry {
  rank: number;
  provider: string;
  price: number;
  price_score: number;
  quality_score: number;
  combined_score: number;
  evaluated: boolean;
}

export interface NewTender {
  description: string;
  max_price: number;
  deadline_days: number;
  weight_price: number;
  weight_quality: number;
}
