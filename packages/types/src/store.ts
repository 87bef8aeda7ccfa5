/**
 * @module store
 * Contracts around the unidirectional store: middleware and persistence.
 */

import type { Action } from './actions';
import type { Subject } from './entities';
import type { AppState } from './state';

/**
 * Hook pair run around every dispatch.
 *
 * Middleware may schedule side effects but must never call `dispatch`
 * synchronously from either hook.
 */
export interface Middleware {
  /** Name used in diagnostics. */
  readonly name: string;
  /** Runs before the reducer with the state the action will be applied to. */
  beforeReduce?(action: Action, state: AppState): void;
  /** Runs after the new state is installed. */
  afterReduce?(action: Action, previous: AppState, next: AppState): void;
}

/** Derives a value from the state. */
export type Selector<V> = (state: AppState) => V;

/** External store of subjects. Its internals are not part of the state core. */
export interface PersistenceAdapter {
  /** Read every persisted subject. */
  load(): Promise<readonly Subject[]>;
  /** Persist the given subjects. Resolves to false when the write failed. */
  save(subjects: readonly Subject[]): Promise<boolean>;
}
