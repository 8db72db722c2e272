/**
 * logger.ts — Levelled console logging.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

type WritableLevel = Exclude<LogLevel, 'silent'>;

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export type LogSink = Pick<Console, WritableLevel>;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  prefix?: string;
}

const SEVERITY: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? console;
  const prefix = options.prefix ?? '[tenderflow]';

  const write = (target: WritableLevel) => (message: string, context?: LogContext) => {
    if (SEVERITY[target] < SEVERITY[level]) return;
    const line = `${prefix} ${target} ${message}`;
    if (context) {
      sink[target](line, context);
    } else {
      sink[target](line);
    }
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
