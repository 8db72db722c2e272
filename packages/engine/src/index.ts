/**
 * @tenderflow/engine — Tender lifecycle, offer intake, evaluation and winner selection.
 *
 * Usage:
 *   import { TenderService, loadConfig } from '@tenderflow/engine';
 *   const service = TenderService.fromConfig(loadConfig());
 */

export { TenderService } from './service.js';
export type { TenderServiceOptions } from './service.js';
export { TenderRegistry } from './tender-registry.js';
export type { CreateTenderInput } from './tender-registry.js';
export { OfferRegistry } from './offer-registry.js';
export { EvaluationEngine } from './evaluation-engine.js';
export { WinnerSelector } from './winner-selector.js';
export { TenderStore } from './store.js';
export { InMemoryAccessControl, authorize, REQUIRED_ROLE } from './access-control.js';
export type { AccessControl } from './access-control.js';
export { priceScore, combinedScore, scoreOffer } from './scoring.js';
export { KeyedMutex } from './keyed-mutex.js';
export { TenderError, isTenderError } from './errors.js';
export type { TenderErrorCode } from './errors.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, LogSink } from './logger.js';
export { loadConfig, ConfigSchema } from './config.js';
export type { EngineConfig } from './config.js';
