/**
 * @module logger
 * pino loggers for the core. Components log through a child logger tagged
 * with `component`.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { NotecoreConfig } from './config';

export type { Logger } from 'pino';

/** Component names used for child loggers. */
export type LogComponent = 'store' | 'bridge' | 'persistence' | 'runtime';

/**
 * Create the root logger. With `debug` set, the level drops to `debug`
 * unless `trace` was asked for.
 *
 * @param destination - Where lines are written; stdout when omitted.
 */
export function createLogger(
  config: Pick<NotecoreConfig, 'logLevel'> & Partial<Pick<NotecoreConfig, 'debug'>>,
  destination?: DestinationStream,
): Logger {
  const options: LoggerOptions = {
    name: 'notecore',
    level: config.debug && config.logLevel !== 'trace' ? 'debug' : config.logLevel,
  };
  return destination ? pino(options, destination) : pino(options);
}

/** A logger that writes nothing. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Child logger for one component. */
export function componentLogger(root: Logger, component: LogComponent): Logger {
  return root.child({ component });
}
