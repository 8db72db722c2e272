import { createLogger, isLogLevel } from '@tenderflow/engine';

const level = process.env.LOG_LEVEL;

export const logger = createLogger({
  level: isLogLevel(level) ? level : 'info',
  prefix: '[tenderflow:web]',
});
