import { SCORE_MAX, WEIGHT_TOTAL } from '@tenderflow/shared';

/** Price competitiveness relative to the tender's ceiling, capped at 100. */
export function priceScore(maxPrice: number, price: number): number {
  return Math.min(SCORE_MAX, Math.floor((maxPrice * SCORE_MAX) / price));
}

export function combinedScore(
  priceScoreValue: number,
  qualityScore: number,
  weightPrice: number,
  weightQuality: number,
): number {
  return Math.floor((priceScoreValue * weightPrice + qualityScore * weightQuality) / WEIGHT_TOTAL);
}

export interface ScoredOffer {
  provider: string;
  price: number;
  priceScore: number;
  qualityScore: number;
  combinedScore: number;
  evaluated: boolean;
}

/** Combined score is 0 until the offer has been evaluated. */
export function scoreOffer(
  tender: { maxPrice: number; weightPrice: number; weightQuality: number },
  offer: { provider: string; price: number; qualityScore: number; evaluated: boolean },
): ScoredOffer {
  const ps = priceScore(tender.maxPrice, offer.price);
  return {
    provider: offer.provider,
    price: offer.price,
    priceScore: ps,
    qualityScore: offer.qualityScore,
    combinedScore: offer.evaluated
      ? combinedScore(ps, offer.qualityScore, tender.weightPrice, tender.weightQuality)
      : 0,
    evaluated: offer.evaluated,
  };
}
