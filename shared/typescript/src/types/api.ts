/**
 * types/api.ts — Response envelope types used by packages/web route handlers.
 */

import type { ErrorCode } from '../constants.js';

export interface ApiSingleResponse<T> {
  data: T;
}

export interface ApiListResponse<T> {
  data: T[];
  meta: { total: number };
}

export interface ApiError {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

/** Role an operation requires of its caller */
export type Role = 'authority' | 'evaluator' | 'any';

/** Mutating operations routed through the authorization check */
export type Operation =
  | 'createTender'
  | 'closeOfferPeriod'
  | 'markAsEvaluated'
  | 'calculateWinner'
  | 'submitOffer'
  | 'evaluateOffer'
  | 'addEvaluator'
  | 'removeEvaluator'
  | 'transferAuthority';
