/**
 * @notecore/types
 *
 * Shared type definitions for the notecore state core.
 * This package contains zero runtime code — only TypeScript interfaces and
 * types that serve as the "contract" between packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Clock, EmptyPayload, Id, OpaqueHandle, Timestamp } from './common';

// Domain entities
export type { CanvasTemplate, Note, Page, Subject, TemplateType } from './entities';

// Application state
export type {
  AppState,
  ContentState,
  NavigationState,
  SelectionState,
  SettingsState,
  SortOption,
  SortOrder,
  UIState,
  ViewMode,
} from './state';

// Actions
export type {
  Action,
  ActionCategory,
  ActionOf,
  NavigationAction,
  NoteAction,
  PageAction,
  SettingsAction,
  SubjectAction,
  TemplateAction,
} from './actions';

// Events
export type { EventBus, EventCallback, EventMap, EventName, SubscriptionHandle } from './events';

// Store contracts
export type { Middleware, PersistenceAdapter, Selector } from './store';

// Legacy broadcast boundary
export type { LegacyNotificationCenter, LegacyObserver, LegacyPayload } from './legacy';
