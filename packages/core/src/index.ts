/**
 * @notecore/core
 *
 * State core of the note-taking app: typed event bus, reducers, store,
 * middleware and the legacy notification bridge.
 *
 * @packageDocumentation
 */

// Time
export { fixedClock, systemClock } from './clock';

// Errors and configuration
export { ConfigError, NotecoreError, ReentrantDispatchError } from './errors';
export type { NotecoreErrorCode } from './errors';
export { DEFAULT_CONFIG, LOG_LEVELS, loadConfig } from './config';
export type { LogLevel, NotecoreConfig } from './config';
export { componentLogger, createLogger, silentLogger } from './logger';
export type { LogComponent, Logger } from './logger';

// Events
export { EventBusImpl } from './event-bus';
export { SubscriptionManager } from './subscription-manager';
export { EVENT_DESCRIPTIONS, describeEvent } from './event-descriptions';
export { HandleRegistry } from './handle-registry';

// Entities and state
export { createNote, createPage, createSubject, generateId, sameEntity } from './entity-factory';
export type { CreateNoteOptions, CreatePageOptions, CreateSubjectOptions } from './entity-factory';
export { TEMPLATE_LABELS, TEMPLATE_PRESETS } from './templates';
export { EMPTY_SELECTION, createInitialState, hydrateState } from './initial-state';

// Actions and reducers
export {
  describeAction,
  isContentAction,
  navigationActions,
  noteActions,
  pageActions,
  settingsActions,
  subjectActions,
  templateActions,
} from './actions';
export { reduce, reduceContent, reduceSettings, reduceUI } from './reducers';
export {
  selectEffectiveTemplate,
  selectSelectedNote,
  selectSelectedNoteIndex,
  selectSelectedPage,
  selectSelectedSubject,
  selectSelectedSubjectIndex,
  selectVisibleNotes,
  selectVisibleSubjects,
  sortNotes,
} from './selectors';

// Store and middleware
export { Store, createNewNote, createStoreFromPersistence } from './store';
export type { Equality, StoreOptions } from './store';
export { createLoggingMiddleware } from './middleware/logging-middleware';
export { PersistenceMiddleware } from './middleware/persistence-middleware';
export type { PersistenceMiddlewareOptions } from './middleware/persistence-middleware';
export { InMemoryPersistence } from './in-memory-persistence';

// Action events and commands
export { attachActionEvents, publishActionEvents } from './action-events';
export { bindEventCommands } from './event-commands';

// Legacy bridge
export { BRIDGED_EVENTS, LegacyNotificationBridge } from './legacy-bridge';
export type { BridgedEventName, LegacyBridgeOptions } from './legacy-bridge';
export { InMemoryNotificationCenter } from './legacy-notification-center';

// Composition
export { createNotecoreRuntime } from './runtime';
export type { NotecoreRuntime, NotecoreRuntimeOptions } from './runtime';
