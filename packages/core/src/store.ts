/**
 * @module store
 * The unidirectional store: every state change is an action run through the
 * reducer pipeline, wrapped by middleware, and announced on the event bus.
 *
 * Dispatch order:
 * 1. `beforeReduce` of each middleware, in registration order
 * 2. reduce
 * 3. install the new state
 * 4. `afterReduce` of each middleware, in registration order
 * 5. `store:state-changed`, snapshot observers, and `store:action-ignored`
 *    when nothing changed
 *
 * Steps 1-4 hold the dispatch guard. Step 5 runs after it is released, so
 * observers may dispatch; such a dispatch completes before the outer one
 * returns.
 */

import { freeze } from 'immer';
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { Action, AppState, Clock, EventBus, Middleware, PersistenceAdapter, Selector } from '@notecore/types';
import { describeAction, noteActions } from './actions';
import { systemClock } from './clock';
import { createNote, createPage } from './entity-factory';
import { ReentrantDispatchError } from './errors';
import { createInitialState, hydrateState } from './initial-state';
import { silentLogger, type Logger } from './logger';
import { reduce } from './reducers';

/** Options for {@link Store}. */
export interface StoreOptions {
  bus: EventBus;
  initialState?: AppState;
  logger?: Logger;
  /** Throw on reentrant dispatch instead of logging and dropping it. */
  debug?: boolean;
  /** Source of touch timestamps. */
  clock?: Clock;
}

/** Equality test used by {@link Store.observe}. */
export type Equality<V> = (a: V, b: V) => boolean;

export class Store {
  /** Read-only snapshot store for observers and UI bindings. Updated in step 5 only. */
  readonly snapshots: StoreApi<AppState>;

  private state: AppState;
  private middlewares: Middleware[] = [];
  private dispatching = false;
  private readonly bus: EventBus;
  private readonly logger: Logger;
  private readonly debug: boolean;
  private readonly clock: Clock;

  constructor(options: StoreOptions) {
    this.bus = options.bus;
    this.state = freeze(options.initialState ?? createInitialState(), true);
    this.logger = options.logger ?? silentLogger();
    this.debug = options.debug ?? false;
    this.clock = options.clock ?? systemClock;
    const initial = this.state;
    this.snapshots = createStore<AppState>()(() => initial);
  }

  /** The current state. */
  getState(): AppState {
    return this.state;
  }

  /** Evaluate `selector` against the current state. */
  select<V>(selector: Selector<V>): V {
    return selector(this.state);
  }

  /**
   * Call `listener` whenever the selected value changes between snapshots.
   *
   * @returns A function that stops observing.
   */
  observe<V>(
    selector: Selector<V>,
    listener: (value: V, previous: V) => void,
    equals: Equality<V> = Object.is,
  ): () => void {
    return this.snapshots.subscribe((state, previousState) => {
      const value = selector(state);
      const previous = selector(previousState);
      if (!equals(value, previous)) listener(value, previous);
    });
  }

  /**
   * Append a middleware.
   *
   * @returns A function that removes it again.
   */
  registerMiddleware(middleware: Middleware): () => void {
    this.middlewares.push(middleware);
    return () => {
      this.middlewares = this.middlewares.filter((m) => m !== middleware);
    };
  }

  /**
   * Run `action` through the pipeline.
   *
   * @throws ReentrantDispatchError when called from a middleware hook in debug mode.
   */
  dispatch(action: Action): void {
    if (this.dispatching) {
      this.rejectReentrant(action);
      return;
    }

    const previous = this.state;
    const middlewares = [...this.middlewares];
    this.dispatching = true;
    try {
      for (const middleware of middlewares) {
        middleware.beforeReduce?.(action, previous);
      }
      const next = reduce(previous, action, this.clock);
      this.state = next;
      for (const middleware of middlewares) {
        middleware.afterReduce?.(action, previous, next);
      }
    } finally {
      this.dispatching = false;
    }

    const next = this.state;
    this.bus.publish('store:state-changed', { action, previous, next });
    // A state-changed subscriber may have dispatched already; publish the newest state.
    this.snapshots.setState(this.state, true);
    if (next === previous) {
      this.bus.publish('store:action-ignored', { action, description: describeAction(action) });
    }
  }

  private rejectReentrant(action: Action): void {
    const description = describeAction(action);
    if (this.debug || this.state.ui.isDebugMode) {
      throw new ReentrantDispatchError(description);
    }
    this.logger.error({ category: action.category, type: action.type }, `Reentrant dispatch dropped: ${description}`);
  }
}

/**
 * Build a store whose initial content is read from `persistence`.
 * The first loaded subject starts out selected.
 */
export async function createStoreFromPersistence(
  persistence: PersistenceAdapter,
  options: Omit<StoreOptions, 'initialState'>,
): Promise<Store> {
  const subjects = await persistence.load();
  return new Store({ ...options, initialState: hydrateState(subjects) });
}

/**
 * Add a note with one blank page to the selected subject. Both use the
 * default template. Does nothing when no subject is selected.
 *
 * @returns The id of the new note, or null when nothing was added.
 */
export function createNewNote(store: Store, title: string): string | null {
  const state = store.getState();
  const subjectId = state.content.selection.subjectId;
  if (subjectId === null || !state.content.subjects.some((s) => s.id === subjectId)) return null;

  const template = state.settings.defaultTemplate;
  const note = createNote(title, {
    pages: [createPage({ template })],
    noteTemplate: template,
  });
  store.dispatch(noteActions.add(note, subjectId));
  return note.id;
}
