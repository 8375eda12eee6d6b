import { type DestinationStream, type Level, type Logger, pino } from 'pino';

/** Levels accepted by {@link createLogger}; `silent` turns logging off. */
export type LogLevel = Level | 'silent';

/** Options for {@link createLogger}. */
export interface LoggerOptions {
  /** @default 'silent' */
  level?: LogLevel;
  /** Where log lines go, stdout when omitted. */
  destination?: DestinationStream;
}

/**
 * Creates the pino logger the client reports request outcomes to.
 */
export function createLogger({ level = 'silent', destination }: LoggerOptions = {}): Logger {
  const options = { name: 'gamma-typed', level };
  return destination ? pino(options, destination) : pino(options);
}

export type { Logger };
