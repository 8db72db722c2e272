/**
 * constants.ts — Canonical reference values shared by the engine and the API.
 */

import type { TenderStatus } from './types/procurement.js';

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

/** In lifecycle order */
export const TENDER_STATUSES = [
  'open',
  'closed',
  'evaluated',
  'finalized',
] as const satisfies readonly TenderStatus[];

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

export const SCORE_MAX = 100;

/** weight_price + weight_quality must equal this */
export const WEIGHT_TOTAL = 100;

/** Keeps max_price * SCORE_MAX within the safe integer range */
export const MAX_PRICE = Math.floor(Number.MAX_SAFE_INTEGER / SCORE_MAX);

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export const ERROR_CODES = [
  'UNAUTHORIZED',
  'NOT_FOUND',
  'INVALID_STATE',
  'INVALID_INPUT',
  'DEADLINE_VIOLATION',
  'ALREADY_EXISTS',
  'INTERNAL_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/** HTTP status for each error code, used by packages/web */
export const ERROR_HTTP_STATUS: Readonly<Record<ErrorCode, number>> = {
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  ALREADY_EXISTS: 409,
  INVALID_INPUT: 422,
  DEADLINE_VIOLATION: 422,
  INTERNAL_ERROR: 500,
};

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

/** Header an upstream gateway sets to the authenticated caller */
export const CALLER_HEADER = 'x-caller-identity';
