import { beforeEach, describe, expect, it } from 'vitest';
import { AUTHORITY, DEADLINE, EVALUATOR, ROAD_WORKS, START, captureError, setup } from './helpers.js';
import type { Fixture } from './helpers.js';
import type { CreateTenderInput } from '../src/tender-registry.js';

describe('TenderRegistry', () => {
  let fx: Fixture;

  beforeEach(() => {
    fx = setup();
  });

  describe('createTender', () => {
    it('opens a tender with sequential ids and a deadline days ahead', () => {
      const first = fx.tenders.createTender(AUTHORITY, ROAD_WORKS);
      const second = fx.tenders.createTender(AUTHORITY, { ...ROAD_WORKS, description: 'Bridge survey' });

      expect(first).toEqual({
        id: 1,
        creator: AUTHORITY,
        description: 'Road resurfacing, lot 3',
        max_price: 1000,
        deadline: '2026-06-08T09:00:00.000Z',
        weight_price: 60,
        weight_quality: 40,
        status: 'open',
        winner: null,
        participant_count: 0,
        created_at: START.toISOString(),
      });
      expect(second.id).toBe(2);
      expect(fx.tenders.tenderCount()).toBe(2);
      expect(fx.tenders.listTenders().map((t) => t.description)).toEqual([
        'Road resurfacing, lot 3',
        'Bridge survey',
      ]);
    });

    it('counts deadline days as fixed 24-hour periods across a daylight-saving change', () => {
      fx.clock.set(new Date('2026-10-30T12:00:00.000Z'));
      const tender = fx.tenders.createTender(AUTHORITY, { ...ROAD_WORKS, deadlineDays: 3 });
      expect(tender.deadline).toBe('2026-11-02T12:00:00.000Z');
    });

    it('accepts weights at the edges', () => {
      const tender = fx.tenders.createTender(AUTHORITY, { ...ROAD_WORKS, weightPrice: 100, weightQuality: 0 });
      expect(tender.weight_price + tender.weight_quality).toBe(100);
    });

    const invalidInputs: Array<[string, Partial<CreateTenderInput>, string]> = [
      ['weights summing to 90', { weightPrice: 50, weightQuality: 40 }, 'weights must be integers summing to 100'],
      ['weights summing to 110', { weightPrice: 70, weightQuality: 40 }, 'weights must be integers summing to 100'],
      ['a negative weight', { weightPrice: 110, weightQuality: -10 }, 'weights must be integers summing to 100'],
      ['a zero max price', { maxPrice: 0 }, 'maxPrice must be a positive integer'],
      ['a fractional max price', { maxPrice: 10.5 }, 'maxPrice must be a positive integer'],
      ['zero deadline days', { deadlineDays: 0 }, 'deadlineDays must be a positive integer'],
      ['an empty description', { description: '   ' }, 'description must not be empty'],
    ];

    it.each(invalidInputs)('rejects %s', (_label, patch, message) => {
      const err = captureError(() => fx.tenders.createTender(AUTHORITY, { ...ROAD_WORKS, ...patch }));
      expect(err.code).toBe('INVALID_INPUT');
      expect(err.message).toBe(message);
      expect(fx.tenders.tenderCount()).toBe(0);
    });

    it('is restricted to the authority', () => {
      expect(captureError(() => fx.tenders.createTender(EVALUATOR, ROAD_WORKS)).code).toBe('UNAUTHORIZED');
      expect(fx.tenders.tenderCount()).toBe(0);
    });
  });

  describe('closeOfferPeriod', () => {
    it('closes once the deadline has passed', () => {
      const { id } = fx.tenders.createTender(AUTHORITY, ROAD_WORKS);
      fx.offers.submitOffer('acme', id, 800, 'docs://acme');
      fx.clock.set(new Date(DEADLINE.getTime() + 1));

      expect(fx.tenders.closeOfferPeriod(AUTHORITY, id).status).toBe('closed');
    });

    it('rejects closing at the deadline itself', () => {
      const { id } = fx.tenders.createTender(AUTHORITY, ROAD_WORKS);
      fx.offers.submitOffer('acme', id, 800, 'docs://acme');
      fx.clock.set(DEADLINE);

      const err = captureError(() => fx.tenders.closeOfferPeriod(AUTHORITY, id));
      expect(err.code).toBe('DEADLINE_VIOLATION');
      expect(fx.tenders.getTender(id).status).toBe('open');
    });

    it('rejects a tender without offers and leaves it open', () => {
      const { id } = fx.tenders.createTender(AUTHORITY, ROAD_WORKS);
      fx.clock.advanceDays(30);

      const err = captureError(() => fx.tenders.closeOfferPeriod(AUTHORITY, id));
      expect(err.code).toBe('INVALID_INPUT');
      expect(err.message).toBe('tender has no offers');
      expect(fx.tenders.getTender(id).status).toBe('open');
    });

    it('rejects a second close', () => {
      const { id } = fx.tenders.createTender(AUTHORITY, ROAD_WORKS);
      fx.offers.submitOffer('acme', id, 800, 'docs://acme');
      fx.clock.advanceDays(8);
      fx.tenders.closeOfferPeriod(AUTHORITY, id);

      expect(captureError(() => fx.tenders.closeOfferPeriod(AUTHORITY, id)).code).toBe('INVALID_STATE');
    });

    it('reports unknown tenders', () => {
      expect(captureError(() => fx.tenders.closeOfferPeriod(AUTHORITY, 42)).code).toBe('NOT_FOUND');
    });
  });

  describe('markAsEvaluated', () => {
    function closedWithThree(): number {
      const { id } = fx.tenders.createTender(AUTHORITY, ROAD_WORKS);
      for (const provider of ['acme', 'globex', 'initech']) {
        fx.offers.submitOffer(provider, id, 900, `docs://${provider}`);
      }
      fx.clock.advanceDays(8);
      fx.tenders.closeOfferPeriod(AUTHORITY, id);
      return id;
    }

    it('fails while any one of three offers is unevaluated', () => {
      const id = closedWithThree();
      fx.evaluations.evaluateOffer(EVALUATOR, id, 'acme', 70);
      fx.evaluations.evaluateOffer(EVALUATOR, id, 'initech', 40);

      const err = captureError(() => fx.tenders.markAsEvaluated(AUTHORITY, id));
      expect(err.code).toBe('INVALID_INPUT');
      expect(err.message).toBe('not all offers are evaluated');
      expect(err.details).toEqual({ tenderId: id, provider: 'globex' });
      expect(fx.tenders.getTender(id).status).toBe('closed');
    });

    it('succeeds once every offer is evaluated, including a score of zero', () => {
      const id = closedWithThree();
      fx.evaluations.evaluateOffer(EVALUATOR, id, 'acme', 70);
      fx.evaluations.evaluateOffer(EVALUATOR, id, 'globex', 0);
      fx.evaluations.evaluateOffer(EVALUATOR, id, 'initech', 40);

      expect(fx.tenders.markAsEvaluated(AUTHORITY, id).status).toBe('evaluated');
    });

    it('requires a closed tender', () => {
      const { id } = fx.tenders.createTender(AUTHORITY, ROAD_WORKS);
      expect(captureError(() => fx.tenders.markAsEvaluated(AUTHORITY, id)).code).toBe('INVALID_STATE');
    });

    it('is restricted to the authority', () => {
      const id = closedWithThree();
      expect(captureError(() => fx.tenders.markAsEvaluated(EVALUATOR, id)).code).toBe('UNAUTHORIZED');
    });
  });

  it('reports unknown tenders on read', () => {
    const err = captureError(() => fx.tenders.getTender(7));
    expect(err.code).toBe('NOT_FOUND');
    expect(err.message).toBe('tender 7 does not exist');
  });
});
