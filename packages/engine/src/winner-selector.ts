/**
 * winner-selector.ts — Weighted winner selection and the audit ranking.
 */

import type { RankingEntry, Tender } from '@tenderflow/shared';
import { authorize } from './access-control.js';
import type { AccessControl } from './access-control.js';
import { alreadyExists, invalidState } from './errors.js';
import { scoreOffer } from './scoring.js';
import { toTender } from './store.js';
import type { TenderStore } from './store.js';

export class WinnerSelector {
  constructor(
    private readonly store: TenderStore,
    private readonly access: AccessControl,
  ) {}

  /**
   * Picks the offer with the highest combined score and finalizes the tender.
   * Only a strictly greater score displaces the leader, so ties go to the
   * earliest submission.
   */
  calculateWinner(caller: string, tenderId: number): Tender {
    authorize(this.access, caller, 'calculateWinner');

    const tender = this.store.requireTender(tenderId);
    if (tender.status === 'finalized' || tender.winner !== null) {
      throw alreadyExists('winner already calculated', { tenderId, winner: tender.winner });
    }
    if (tender.status !== 'evaluated') {
      throw invalidState('tender has not been evaluated', { tenderId, status: tender.status });
    }

    let leader: string | null = null;
    let best = -1;
    for (const offer of this.store.offersOf(tenderId)) {
      const { combinedScore } = scoreOffer(tender, offer);
      if (combinedScore > best) {
        best = combinedScore;
        leader = offer.provider;
      }
    }
    if (leader === null) {
      throw invalidState('no valid winner', { tenderId });
    }

    tender.winner = leader;
    tender.status = 'finalized';
    return toTender(tender, this.store.participantsOf(tenderId).length);
  }

  /** Every offer with its scores, best first; equal scores keep submission order. */
  getRanking(tenderId: number): RankingEntry[] {
    const tender = this.store.requireTender(tenderId);
    const scored = this.store.offersOf(tenderId).map((offer) => scoreOffer(tender, offer));
    scored.sort((a, b) => b.combinedScore - a.combinedScore);
    return scored.map((entry, index) => ({
      rank: index + 1,
      provider: entry.provider,
      price: entry.price,
      price_score: entry.priceScore,
      quality_score: entry.qualityScore,
      combined_score: entry.combinedScore,
      evaluated: entry.evaluated,
    }));
  }
}
