import { z } from 'zod';
import { CALLER_HEADER, TENDER_STATUSES } from '@tenderflow/shared';
import type { NewTender } from '@tenderflow/shared';
import { TenderError } from '@tenderflow/engine';

// Shape checks only; business rules (weights, price ceilings, ...) are the engine's.

export const NewTenderSchema = z.object({
  description: z.string(),
  max_price: z.number(),
  deadline_days: z.number(),
  weight_price: z.number(),
  weight_quality: z.number(),
}) satisfies z.ZodType<NewTender>;

export const SubmitOfferSchema = z.object({
  price: z.number(),
  documentation_ref: z.string(),
});

export const EvaluationSchema = z.object({
  quality_score: z.number(),
});

export const EvaluatorSchema = z.object({
  identity: z.string(),
});

export const AuthorityTransferSchema = z.object({
  new_authority: z.string(),
});

export const StatusFilterSchema = z.enum(TENDER_STATUSES).optional();

const TenderIdSchema = z.coerce.number().int().positive();

export function parseTenderId(raw: string): number {
  return TenderIdSchema.parse(raw);
}

export async function readBody<T>(request: Request, schema: z.ZodType<T>): Promise<T> {
  return schema.parse(await request.json());
}

/** The authenticated caller, as asserted by the gateway in front of this service. */
export function requireCaller(request: Request): string {
  const caller = request.headers.get(CALLER_HEADER)?.trim();
  if (!caller) {
    throw new TenderError('UNAUTHORIZED', `missing ${CALLER_HEADER} header`);
  }
  return caller;
}
