/**
 * config.ts — Environment configuration, validated with zod.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';

const identityList = z
  .string()
  .optional()
  .transform((raw) =>
    (raw ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

export const ConfigSchema = z.object({
  TENDER_AUTHORITY: z.string().trim().min(1, 'TENDER_AUTHORITY must name the authority identity'),
  TENDER_EVALUATORS: identityList,
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface EngineConfig {
  authority: string;
  evaluators: string[];
  logLevel: z.infer<typeof ConfigSchema>['LOG_LEVEL'];
}

export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return {
    authority: parsed.data.TENDER_AUTHORITY,
    evaluators: parsed.data.TENDER_EVALUATORS,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
