/**
 * evaluation-engine.ts — Quality scoring of offers once the offer period is closed.
 */

import { SCORE_MAX } from '@tenderflow/shared';
import type { Offer } from '@tenderflow/shared';
import { authorize } from './access-control.js';
import type { AccessControl } from './access-control.js';
import { alreadyExists, invalidInput, invalidState, notFound } from './errors.js';
import { toOffer } from './store.js';
import type { TenderStore } from './store.js';
import { isIntegerInRange } from './validation.js';

export class EvaluationEngine {
  constructor(
    private readonly store: TenderStore,
    private readonly access: AccessControl,
  ) {}

  /** Scores exactly one offer. A score, once written, is final. */
  evaluateOffer(caller: string, tenderId: number, provider: string, qualityScore: number): Offer {
    authorize(this.access, caller, 'evaluateOffer');

    const tender = this.store.requireTender(tenderId);
    if (tender.status !== 'closed') {
      throw invalidState('offers can only be evaluated while the tender is closed', {
        tenderId,
        status: tender.status,
      });
    }
    if (!isIntegerInRange(qualityScore, 0, SCORE_MAX)) {
      throw invalidInput(`quality score must be an integer between 0 and ${SCORE_MAX}`, {
        qualityScore,
      });
    }
    const offer = this.store.findOffer(tenderId, provider);
    if (!offer) {
      throw notFound('offer does not exist', { tenderId, provider });
    }
    if (offer.evaluated) {
      throw alreadyExists('offer already evaluated', { tenderId, provider });
    }

    offer.qualityScore = qualityScore;
    offer.evaluated = true;
    return toOffer(offer);
  }
}
