/**
 * @module events
 * Type-safe event bus definitions for cross-module communication.
 *
 * Events are keyed by literal names in {@link EventMap}; a misspelt name is a
 * compile error rather than a silently dead subscription.
 */

import type { Action } from './actions';
import type { EmptyPayload, Id, OpaqueHandle } from './common';
import type { CanvasTemplate } from './entities';
import type { AppState } from './state';

/** Map of event names to their payload types. */
export interface EventMap {
  /** A page was selected, programmatically or by the user. */
  'page:selected': { readonly pageIndex: number };
  /** The user picked a page from the thumbnail strip. */
  'page:selected-by-user': { readonly pageIndex: number };
  /** Page selection was released; free scrolling resumes. */
  'page:selection-deactivated': EmptyPayload;
  /** A page was appended to a note. */
  'page:added': { readonly pageId: Id };
  /** Pages were reordered by drag and drop. */
  'page:reordering': { readonly fromIndex: number; readonly toIndex: number };
  /** The page scrolled into view changed. */
  'page:visible-changed': { readonly pageIndex: number };
  /** Request to scroll the canvas to a page. */
  'page:scroll-to': { readonly pageIndex: number };
  /** A page drawing was modified and saved. */
  'drawing:page-changed': { readonly pageId: Id; readonly drawingData?: Uint8Array };
  /** Frequent updates while a stroke is in progress. */
  'drawing:live-update': { readonly pageId: Id };
  /** A stroke began on a page. */
  'drawing:started': { readonly pageId: Id };
  /** A stroke ended on a page. */
  'drawing:completed': { readonly pageId: Id };
  /** Request to redraw the current template. */
  'template:refresh': EmptyPayload;
  /** Request to rebuild the current template from scratch. */
  'template:force-refresh': EmptyPayload;
  /** The default template changed. */
  'template:changed': { readonly template: CanvasTemplate };
  /** The subject sidebar was shown or hidden. */
  'ui:sidebar-visibility-changed': { readonly isVisible: boolean };
  /** Request to close the subject sidebar. */
  'ui:close-sidebar': EmptyPayload;
  /** Request to toggle the subject sidebar. */
  'ui:toggle-sidebar': EmptyPayload;
  /** The coordinate grid was shown or hidden. */
  'grid:state-changed': { readonly isVisible: boolean };
  /** Request to toggle the coordinate grid. */
  'grid:toggle': EmptyPayload;
  /** Debug mode was switched. */
  'system:debug-mode-changed': { readonly isEnabled: boolean };
  /** The auto-scroll preference was switched. */
  'system:auto-scroll-changed': { readonly isEnabled: boolean };
  /** The scroll coordinator of the canvas layer is ready. */
  'system:coordinator-ready': { readonly coordinator: OpaqueHandle };
  /** The store finished a dispatch. */
  'store:state-changed': {
    readonly action: Action;
    readonly previous: AppState;
    readonly next: AppState;
  };
  /** A dispatched action left the state unchanged. */
  'store:action-ignored': { readonly action: Action; readonly description: string };
  /** Content was handed to the persistence collaborator successfully. */
  'persistence:saved': { readonly subjectCount: number };
  /** The persistence collaborator reported a failure. */
  'persistence:failed': { readonly reason: string };
}

/** Any event name. */
export type EventName = keyof EventMap;

/** Callback function type for event listeners. */
export type EventCallback<K extends EventName> = (payload: EventMap[K]) => void;

/** A live registration of interest in one event name. */
export interface SubscriptionHandle<K extends EventName = EventName> {
  /** Monotonically increasing per bus. */
  readonly id: number;
  readonly eventType: K;
  /** True once cancelled, by `cancel()`, `unsubscribe()` or a bus-wide clear. */
  readonly cancelled: boolean;
  /** Cancel the registration. Calling it again is a no-op. */
  cancel(): void;
}

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Deliver `payload` to every current subscriber of `event`, in registration order. */
  publish<K extends EventName>(event: K, payload: EventMap[K]): void;
  /** Subscribe to an event. */
  subscribe<K extends EventName>(event: K, callback: EventCallback<K>): SubscriptionHandle<K>;
  /** Subscribe to an event for a single delivery. */
  once<K extends EventName>(event: K, callback: EventCallback<K>): SubscriptionHandle<K>;
  /** Cancel a registration. Safe to call more than once. */
  unsubscribe(handle: SubscriptionHandle): void;
  /** Names that currently have at least one subscriber. */
  listActiveEventTypes(): ReadonlySet<EventName>;
  /** Number of live subscriptions for `event`. */
  subscriptionCount(event: EventName): number;
  /** Drop every registration on every event. Intended for teardown and tooling. */
  clearAllSubscriptions(): void;
}
