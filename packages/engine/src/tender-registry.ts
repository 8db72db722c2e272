/**
 * tender-registry.ts — Tender creation and the authority-driven phase transitions.
 */

import { MAX_PRICE, SCORE_MAX, WEIGHT_TOTAL } from '@tenderflow/shared';
import type { Tender } from '@tenderflow/shared';
import { addHours, isAfter } from 'date-fns';
import { authorize } from './access-control.js';
import type { AccessControl } from './access-control.js';
import type { Clock } from './clock.js';
import { deadlineViolation, invalidInput, invalidState } from './errors.js';
import { toTender } from './store.js';
import type { TenderRecord, TenderStore } from './store.js';
import { isBlank, isIntegerInRange } from './validation.js';

export interface CreateTenderInput {
  description: string;
  maxPrice: number;
  deadlineDays: number;
  weightPrice: number;
  weightQuality: number;
}

export class TenderRegistry {
  constructor(
    private readonly store: TenderStore,
    private readonly access: AccessControl,
    private readonly clock: Clock,
  ) {}

  createTender(caller: string, input: CreateTenderInput): Tender {
    authorize(this.access, caller, 'createTender');

    const { description, maxPrice, deadlineDays, weightPrice, weightQuality } = input;
    if (
      !isIntegerInRange(weightPrice, 0, SCORE_MAX) ||
      !isIntegerInRange(weightQuality, 0, SCORE_MAX) ||
      weightPrice + weightQuality !== WEIGHT_TOTAL
    ) {
      throw invalidInput(`weights must be integers summing to ${WEIGHT_TOTAL}`, {
        weightPrice,
        weightQuality,
      });
    }
    if (!isIntegerInRange(maxPrice, 1, MAX_PRICE)) {
      throw invalidInput('maxPrice must be a positive integer', { maxPrice });
    }
    if (!Number.isSafeInteger(deadlineDays) || deadlineDays <= 0) {
      throw invalidInput('deadlineDays must be a positive integer', { deadlineDays });
    }
    if (isBlank(description)) {
      throw invalidInput('description must not be empty');
    }

    const now = this.clock.now();
    // Fixed 24-hour days, independent of the host timezone.
    const record = this.store.insertTender({
      creator: caller,
      description,
      maxPrice,
      deadline: addHours(now, deadlineDays * 24),
      weightPrice,
      weightQuality,
      createdAt: now,
    });
    return this.project(record);
  }

  closeOfferPeriod(caller: string, tenderId: number): Tender {
    authorize(this.access, caller, 'closeOfferPeriod');

    const tender = this.store.requireTender(tenderId);
    if (tender.status !== 'open') {
      throw invalidState('offer period is not open', { tenderId, status: tender.status });
    }
    if (!isAfter(this.clock.now(), tender.deadline)) {
      throw deadlineViolation('offer period has not ended yet', {
        tenderId,
        deadline: tender.deadline.toISOString(),
      });
    }
    if (this.store.participantsOf(tenderId).length === 0) {
      throw invalidInput('tender has no offers', { tenderId });
    }

    tender.status = 'closed';
    return this.project(tender);
  }

  markAsEvaluated(caller: string, tenderId: number): Tender {
    authorize(this.access, caller, 'markAsEvaluated');

    const tender = this.store.requireTender(tenderId);
    if (tender.status !== 'closed') {
      throw invalidState('tender is not closed', { tenderId, status: tender.status });
    }
    const participants = this.store.participantsOf(tenderId);
    if (participants.length === 0) {
      throw invalidState('tender has no participants', { tenderId });
    }
    for (const provider of participants) {
      if (!this.store.findOffer(tenderId, provider)?.evaluated) {
        throw invalidInput('not all offers are evaluated', { tenderId, provider });
      }
    }

    tender.status = 'evaluated';
    return this.project(tender);
  }

  getTender(tenderId: number): Tender {
    return this.project(this.store.requireTender(tenderId));
  }

  listTenders(): Tender[] {
    return this.store.allTenders().map((record) => this.project(record));
  }

  tenderCount(): number {
    return this.store.tenderCount();
  }

  private project(record: TenderRecord): Tender {
    return toTender(record, this.store.participantsOf(record.id).length);
  }
}
