/**
 * @module middleware/logging-middleware
 * Debug-level trace of every dispatched action.
 */

import type { Action, AppState, Middleware } from '@notecore/types';
import { describeAction } from '../actions';
import type { Logger } from '../logger';

/**
 * Create a middleware that logs each action when debugging is enabled,
 * either by `forceDebug` or by the state's `ui.isDebugMode` flag.
 *
 * The trace goes through a child logger fixed at `debug`, so switching
 * debug mode on at run time shows it whatever the root level is.
 */
export function createLoggingMiddleware(root: Logger, forceDebug = false): Middleware {
  const logger = root.child({ middleware: 'logging' }, { level: 'debug' });
  const enabled = (state: AppState): boolean => forceDebug || state.ui.isDebugMode;

  return {
    name: 'logging',
    beforeReduce(action: Action, state: AppState) {
      if (!enabled(state)) return;
      logger.debug({ category: action.category, type: action.type }, describeAction(action));
    },
    afterReduce(action: Action, previous: AppState, next: AppState) {
      if (next !== previous || !enabled(next)) return;
      logger.debug({ category: action.category, type: action.type }, 'State unchanged');
    },
  };
}
