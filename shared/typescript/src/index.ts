/**
 * @tenderflow/shared — TypeScript types and constants for the tender workflow.
 *
 * Usage:
 *   import type { Tender, Offer, ApiError } from '@tenderflow/shared';
 *   import { ERROR_CODES, WEIGHT_TOTAL } from '@tenderflow/shared';
 */

// Types
export type {
  ApiSingleResponse,
  ApiListResponse,
  ApiError,
  Role,
  Operation,
} from './types/api.js';
export type {
  Tender,
  TenderStatus,
  Offer,
  OfferSummary,
  RankingEntry,
  NewTender,
} from './types/procurement.js';

// Constants
export {
  TENDER_STATUSES,
  SCORE_MAX,
  WEIGHT_TOTAL,
  MAX_PRICE,
  ERROR_CODES,
  ERROR_HTTP_STATUS,
  CALLER_HEADER,
} from './constants.js';
export type { ErrorCode } from './constants.js';
