import { z } from 'zod';

import { LOG_LEVELS, type InstallMode, type LogLevel } from '../config/types';
import { LOGGING_DEFAULTS } from '../config/defaults';

const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
  information: 'info',
  warning: 'warn',
  critical: 'fatal',
  none: 'silent'
};

export const logLevelSchema = z.preprocess(
  (value) => {
    if (typeof value !== 'string') return value;
    const normalized = value.trim().toLowerCase();
    return LOG_LEVEL_ALIASES[normalized] ?? normalized;
  },
  z.enum(LOG_LEVELS)
);

/**
 * Parses a user-supplied level. Accepts pino's level names and the long
 * forms `information`, `warning`, `critical` and `none`, in any case.
 */
export function parseLogLevel(value: string): LogLevel {
  const parsed = logLevelSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid log level "${value}". Expected one of: ${LOG_LEVELS.join(', ')}`);
  }
  return parsed.data;
}

export function resolveInstallLogLevel(mode: InstallMode, explicit?: LogLevel): LogLevel {
  if (explicit !== undefined) {
    return explicit;
  }
  return mode === 'develop' ? LOGGING_DEFAULTS.DEVELOP_LEVEL : LOGGING_DEFAULTS.INSTALLED_LEVEL;
}
