import { type Level, type Logger, pino } from 'pino';

/** Log levels a client logger can be created with, including `silent`. */
export type LogLevel = Level | 'silent';

/** Logging options taken from the client settings. */
export interface LoggerOptions {
  /** Existing pino logger to log through. */
  logger?: Logger;
  /** Level for the logger created when none is given. @default 'silent' */
  level?: LogLevel;
}

/**
 * Returns the logger a client traces through: the given one, or a pino
 * logger named after the package that stays silent unless a level is set.
 */
export function createLogger({ logger, level = 'silent' }: LoggerOptions = {}): Logger {
  if (logger) {
    return logger;
  }

  return pino({ name: 'fluent-odata-core', level });
}
