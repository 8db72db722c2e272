/**
 * service.ts — TenderService, the engine's entry point.
 *
 * Mutations on one tender are serialized through a per-tender exclusive section and
 * either apply completely or throw a TenderError without writing anything. Reads are
 * synchronous and return copies.
 */

import type {
  Offer,
  OfferSummary,
  Operation,
  RankingEntry,
  Tender,
} from '@tenderflow/shared';
import { InMemoryAccessControl } from './access-control.js';
import type { AccessControl } from './access-control.js';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';
import type { EngineConfig } from './config.js';
import { isTenderError } from './errors.js';
import { EvaluationEngine } from './evaluation-engine.js';
import { KeyedMutex } from './keyed-mutex.js';
import { createLogger, silentLogger } from './logger.js';
import type { LogContext, Logger } from './logger.js';
import { OfferRegistry } from './offer-registry.js';
import { TenderStore } from './store.js';
import { TenderRegistry } from './tender-registry.js';
import type { CreateTenderInput } from './tender-registry.js';
import { WinnerSelector } from './winner-selector.js';

export interface TenderServiceOptions {
  access: AccessControl;
  clock?: Clock;
  logger?: Logger;
  store?: TenderStore;
}

/** Lock key for operations that touch roles rather than a tender. */
const ROLES_KEY = 'roles';
/** Lock key for id allocation. */
const REGISTRY_KEY = 'registry';

type LockKey = number | typeof ROLES_KEY | typeof REGISTRY_KEY;

export class TenderService {
  private readonly tenders: TenderRegistry;
  private readonly offers: OfferRegistry;
  private readonly evaluations: EvaluationEngine;
  private readonly winners: WinnerSelector;
  private readonly access: AccessControl;
  private readonly logger: Logger;
  private readonly locks = new KeyedMutex<LockKey>();

  constructor(options: TenderServiceOptions) {
    const store = options.store ?? new TenderStore();
    const clock = options.clock ?? systemClock;
    this.access = options.access;
    this.logger = options.logger ?? silentLogger;
    this.tenders = new TenderRegistry(store, this.access, clock);
    this.offers = new OfferRegistry(store, this.access, clock);
    this.evaluations = new EvaluationEngine(store, this.access);
    this.winners = new WinnerSelector(store, this.access);
  }

  static fromConfig(config: EngineConfig, clock?: Clock): TenderService {
    return new TenderService({
      access: new InMemoryAccessControl(config.authority, config.evaluators),
      clock,
      logger: createLogger({ level: config.logLevel }),
    });
  }

  // ---- Roles ----

  currentAuthority(): string {
    return this.access.currentAuthority();
  }

  isEvaluator(identity: string): boolean {
    return this.access.isEvaluator(identity);
  }

  listEvaluators(): string[] {
    return this.access.listEvaluators();
  }

  addEvaluator(caller: string, identity: string): Promise<void> {
    return this.mutate(ROLES_KEY, 'addEvaluator', { caller, identity }, () =>
      this.access.addEvaluator(caller, identity),
    );
  }

  removeEvaluator(caller: string, identity: string): Promise<void> {
    return this.mutate(ROLES_KEY, 'removeEvaluator', { caller, identity }, () =>
      this.access.removeEvaluator(caller, identity),
    );
  }

  transferAuthority(caller: string, newAuthority: string): Promise<void> {
    return this.mutate(ROLES_KEY, 'transferAuthority', { caller, newAuthority }, () =>
      this.access.transferAuthority(caller, newAuthority),
    );
  }

  // ---- Tender lifecycle ----

  createTender(caller: string, input: CreateTenderInput): Promise<Tender> {
    return this.mutate(REGISTRY_KEY, 'createTender', { caller }, () =>
      this.tenders.createTender(caller, input),
    );
  }

  submitOffer(
    caller: string,
    tenderId: number,
    price: number,
    documentationRef: string,
  ): Promise<Offer> {
    return this.mutate(tenderId, 'submitOffer', { caller, tenderId, price }, () =>
      this.offers.submitOffer(caller, tenderId, price, documentationRef),
    );
  }

  closeOfferPeriod(caller: string, tenderId: number): Promise<Tender> {
    return this.mutate(tenderId, 'closeOfferPeriod', { caller, tenderId }, () =>
      this.tenders.closeOfferPeriod(caller, tenderId),
    );
  }

  evaluateOffer(
    caller: string,
    tenderId: number,
    provider: string,
    qualityScore: number,
  ): Promise<Offer> {
    return this.mutate(tenderId, 'evaluateOffer', { caller, tenderId, provider, qualityScore }, () =>
      this.evaluations.evaluateOffer(caller, tenderId, provider, qualityScore),
    );
  }

  markAsEvaluated(caller: string, tenderId: number): Promise<Tender> {
    return this.mutate(tenderId, 'markAsEvaluated', { caller, tenderId }, () =>
      this.tenders.markAsEvaluated(caller, tenderId),
    );
  }

  calculateWinner(caller: string, tenderId: number): Promise<Tender> {
    return this.mutate(tenderId, 'calculateWinner', { caller, tenderId }, () =>
      this.winners.calculateWinner(caller, tenderId),
    );
  }

  // ---- Reads ----

  getTender(tenderId: number): Tender {
    return this.tenders.getTender(tenderId);
  }

  listTenders(): Tender[] {
    return this.tenders.listTenders();
  }

  tenderCount(): number {
    return this.tenders.tenderCount();
  }

  getOffer(tenderId: number, provider: string): Offer {
    return this.offers.getOffer(tenderId, provider);
  }

  getOffers(tenderId: number): OfferSummary {
    return this.offers.getOffers(tenderId);
  }

  getParticipants(tenderId: number): string[] {
    return this.offers.getParticipants(tenderId);
  }

  getRanking(tenderId: number): RankingEntry[] {
    return this.winners.getRanking(tenderId);
  }

  // ---------------------------------------------------------------------------

  private async mutate<T>(
    key: LockKey,
    operation: Operation,
    context: LogContext,
    task: () => T,
  ): Promise<T> {
    return this.locks.runExclusive(key, () => {
      try {
        const result = task();
        this.logger.info(operation, context);
        return result;
      } catch (err) {
        if (isTenderError(err)) {
          this.logger.warn(`${operation} rejected: ${err.message}`, { ...context, code: err.code });
        }
        throw err;
      }
    });
  }
}
