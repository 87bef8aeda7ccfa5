/**
 * @module config
 * Runtime configuration read from environment variables.
 *
 * | variable                    | default | meaning                              |
 * | --------------------------- | ------- | ------------------------------------ |
 * | `NOTECORE_DEBUG`            | false   | throw on reentrant dispatch, log actions |
 * | `NOTECORE_LOG_LEVEL`        | info    | pino level                           |
 * | `NOTECORE_SAVE_DEBOUNCE_MS` | 3000    | delay before content is saved        |
 */

import { z } from 'zod';
import { ConfigError } from './errors';

/** Log levels understood by pino. */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFlag = z
  .enum(['1', '0', 'true', 'false'])
  .transform((value) => value === '1' || value === 'true');

const configSchema = z.object({
  NOTECORE_DEBUG: booleanFlag.default('false'),
  NOTECORE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NOTECORE_SAVE_DEBOUNCE_MS: z.coerce.number().int().nonnegative().default(3000),
});

/** Validated configuration. */
export interface NotecoreConfig {
  readonly debug: boolean;
  readonly logLevel: LogLevel;
  readonly saveDebounceMs: number;
}

/** Configuration used when nothing is set. */
export const DEFAULT_CONFIG: NotecoreConfig = {
  debug: false,
  logLevel: 'info',
  saveDebounceMs: 3000,
};

/**
 * Parse configuration from `env`.
 *
 * @throws ConfigError listing every variable that failed validation.
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): NotecoreConfig {
  const result = configSchema.safeParse({
    NOTECORE_DEBUG: env.NOTECORE_DEBUG,
    NOTECORE_LOG_LEVEL: env.NOTECORE_LOG_LEVEL,
    NOTECORE_SAVE_DEBOUNCE_MS: env.NOTECORE_SAVE_DEBOUNCE_MS,
  });
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigError(keys, result.error.issues.map((issue) => issue.message).join('; '));
  }
  return {
    debug: result.data.NOTECORE_DEBUG,
    logLevel: result.data.NOTECORE_LOG_LEVEL,
    saveDebounceMs: result.data.NOTECORE_SAVE_DEBOUNCE_MS,
  };
}
