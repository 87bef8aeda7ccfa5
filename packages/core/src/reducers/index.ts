/**
 * @module reducers
 * The reducer pipeline: one entry point that fans every action out to the
 * content, UI and settings slice reducers.
 *
 * Reduction is pure and total. An action that references a missing entity,
 * or that a slice does not handle, leaves that slice untouched; when no slice
 * changes, the input state object itself is returned.
 */

import type { Action, AppState, Clock } from '@notecore/types';
import { systemClock } from '../clock';
import { reduceContent } from './content-reducer';
import { reduceSettings } from './settings-reducer';
import { reduceUI } from './ui-reducer';

/**
 * Compute the state that follows `state` under `action`.
 *
 * @param clock - Source of touch timestamps. With a fixed clock the result
 *   is fully deterministic.
 */
export function reduce(state: AppState, action: Action, clock: Clock = systemClock): AppState {
  const content = reduceContent(state.content, action, clock);
  const ui = reduceUI(state.ui, action);
  const settings = reduceSettings(state.settings, action);

  if (content === state.content && ui === state.ui && settings === state.settings) {
    return state;
  }
  return Object.freeze({ content, ui, settings });
}

export { reduceContent } from './content-reducer';
export { reduceSettings } from './settings-reducer';
export { reduceUI } from './ui-reducer';
