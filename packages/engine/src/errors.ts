/**
 * errors.ts — Error taxonomy for every rejected tender operation.
 */

import type { ErrorCode } from '@tenderflow/shared';

export type TenderErrorCode = Exclude<ErrorCode, 'INTERNAL_ERROR'>;

export class TenderError extends Error {
  readonly code: TenderErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: TenderErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'TenderError';
    this.code = code;
    this.details = details;
  }
}

export function isTenderError(err: unknown): err is TenderError {
  return err instanceof TenderError;
}

// ---------------------------------------------------------------------------
// Shorthands
// ---------------------------------------------------------------------------

export const unauthorized = (message: string, details?: Record<string, unknown>) =>
  new TenderError('UNAUTHORIZED', message, details);

export const notFound = (message: string, details?: Record<string, unknown>) =>
  new TenderError('NOT_FOUND', message, details);

export const invalidState = (message: string, details?: Record<string, unknown>) =>
  new TenderError('INVALID_STATE', message, details);

export const invalidInput = (message: string, details?: Record<string, unknown>) =>
  new TenderError('INVALID_INPUT', message, details);

export const deadlineViolation = (message: string, details?: Record<string, unknown>) =>
  new TenderError('DEADLINE_VIOLATION', message, details);

export const alreadyExists = (message: string, details?: Record<string, unknown>) =>
  new TenderError('ALREADY_EXISTS', message, details);
