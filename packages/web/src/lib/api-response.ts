import { NextResponse } from 'next/server';
import { ZodError } from 'zod';
import { ERROR_HTTP_STATUS } from '@tenderflow/shared';
import type { ApiError, ApiListResponse, ApiSingleResponse, ErrorCode } from '@tenderflow/shared';
import { isTenderError } from '@tenderflow/engine';
import { logger } from '@/lib/logger';

// ---------------------------------------------------------------------------
// Success envelopes
// ---------------------------------------------------------------------------

export function ok<T>(data: T, status = 200) {
  return NextResponse.json<ApiSingleResponse<T>>({ data }, { status });
}

export function list<T>(data: T[]) {
  return NextResponse.json<ApiListResponse<T>>({ data, meta: { total: data.length } });
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

function fail(code: ErrorCode, message: string, details?: Record<string, unknown>) {
  const body: ApiError = { error: details ? { code, message, details } : { code, message } };
  return NextResponse.json<ApiError>(body, { status: ERROR_HTTP_STATUS[code] });
}

export function errorResponse(err: unknown) {
  if (isTenderError(err)) {
    return fail(err.code, err.message, err.details);
  }
  if (err instanceof ZodError) {
    return fail('INVALID_INPUT', 'request failed validation', {
      issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  if (err instanceof SyntaxError) {
    return fail('INVALID_INPUT', 'request body must be valid JSON');
  }
  logger.error('unhandled error', { error: err instanceof Error ? err.message : String(err) });
  return fail('INTERNAL_ERROR', 'Internal server error');
}

/** Runs a handler and turns anything it throws into an ApiError response. */
export async function handle(run: () => Promise<Response> | Response): Promise<Response> {
  try {
    return await run();
  } catch (err) {
    return errorResponse(err);
  }
}
