import { addHours } from 'date-fns';
import { InMemoryAccessControl } from '../src/access-control.js';
import type { Clock } from '../src/clock.js';
import { TenderError } from '../src/errors.js';
import { EvaluationEngine } from '../src/evaluation-engine.js';
import { OfferRegistry } from '../src/offer-registry.js';
import { TenderStore } from '../src/store.js';
import { TenderRegistry } from '../src/tender-registry.js';
import type { CreateTenderInput } from '../src/tender-registry.js';
import { WinnerSelector } from '../src/winner-selector.js';

export const AUTHORITY = 'authority-1';
export const EVALUATOR = 'evaluator-1';
export const START = new Date('2026-06-01T09:00:00.000Z');
/** START plus the seven days of ROAD_WORKS */
export const DEADLINE = new Date('2026-06-08T09:00:00.000Z');

export const ROAD_WORKS: CreateTenderInput = {
  description: 'Road resurfacing, lot 3',
  maxPrice: 1000,
  deadlineDays: 7,
  weightPrice: 60,
  weightQuality: 40,
};

export class ManualClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = date;
  }

  advanceDays(days: number): void {
    this.current = addHours(this.current, days * 24);
  }
}

export function setup() {
  const clock = new ManualClock(START);
  const access = new InMemoryAccessControl(AUTHORITY, [EVALUATOR]);
  const store = new TenderStore();
  return {
    clock,
    access,
    store,
    tenders: new TenderRegistry(store, access, clock),
    offers: new OfferRegistry(store, access, clock),
    evaluations: new EvaluationEngine(store, access),
    winners: new WinnerSelector(store, access),
  };
}

export type Fixture = ReturnType<typeof setup>;

/** Creates a tender, collects the given offers and closes it. */
export function closedTender(
  fx: Fixture,
  offers: Array<[provider: string, price: number]>,
  input: CreateTenderInput = ROAD_WORKS,
): number {
  const { id } = fx.tenders.createTender(AUTHORITY, input);
  for (const [provider, price] of offers) {
    fx.offers.submitOffer(provider, id, price, `docs://${provider}`);
  }
  fx.clock.advanceDays(input.deadlineDays + 1);
  fx.tenders.closeOfferPeriod(AUTHORITY, id);
  return id;
}

export function captureError(fn: () => unknown): TenderError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TenderError) return err;
    throw err;
  }
  throw new Error('expected a TenderError');
}

export async function captureRejection(promise: Promise<unknown>): Promise<TenderError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof TenderError) return err;
    throw err;
  }
  throw new Error('expected a TenderError');
}
