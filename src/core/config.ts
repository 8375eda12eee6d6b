import { z } from 'zod';
import { ConfigurationError } from '../error/configurationError.js';
import type { SafeWrap } from '../utils/wrap.js';
import type { LogLevel } from '../utils/logger.js';

/** Environment variable read for the default log level. */
export const LOG_LEVEL_ENV = 'GAMMA_LOG_LEVEL';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Resolves the log level from the environment, `silent` when unset.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): SafeWrap<ConfigurationError, LogLevel> {
  const raw = env[LOG_LEVEL_ENV]?.trim();
  if (!raw) {
    return [null, 'silent'];
  }

  const parsed = logLevelSchema.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    return [new ConfigurationError(`error invalid ${LOG_LEVEL_ENV} ${raw}`, raw, { cause: parsed.error }), null];
  }

  return [null, parsed.data];
}
