/**
 * @module action-events
 * Republishes store changes as domain events, so canvas and UI
 * collaborators can listen for what happened without knowing about actions.
 */

import type { Action, AppState, EventBus, SubscriptionHandle } from '@notecore/types';

/**
 * Publish the domain events implied by one effective dispatch.
 * Actions that left the state unchanged publish nothing.
 */
export function publishActionEvents(bus: EventBus, action: Action, previous: AppState, next: AppState): void {
  if (next === previous) return;

  switch (action.type) {
    case 'addPage':
      bus.publish('page:added', { pageId: action.page.id });
      return;
    case 'reorderPages':
      bus.publish('page:reordering', { fromIndex: action.fromIndex, toIndex: action.toIndex });
      return;
    case 'selectPage':
      bus.publish('page:selected', { pageIndex: next.content.selection.pageIndex });
      return;
    case 'setDefaultTemplate':
      bus.publish('template:changed', { template: next.settings.defaultTemplate });
      return;
    case 'updateSubjectSidebarVisibility':
      if (next.ui.isSubjectSidebarVisible !== previous.ui.isSubjectSidebarVisible) {
        bus.publish('ui:sidebar-visibility-changed', { isVisible: next.ui.isSubjectSidebarVisible });
      }
      return;
    case 'updateCoordinateGridVisibility':
      if (next.ui.isCoordinateGridVisible !== previous.ui.isCoordinateGridVisible) {
        bus.publish('grid:state-changed', { isVisible: next.ui.isCoordinateGridVisible });
      }
      return;
    case 'updateDebugModeSetting':
      if (next.ui.isDebugMode !== previous.ui.isDebugMode) {
        bus.publish('system:debug-mode-changed', { isEnabled: next.ui.isDebugMode });
      }
      return;
    case 'updateAutoScrollSetting':
      if (next.settings.autoScrollEnabled !== previous.settings.autoScrollEnabled) {
        bus.publish('system:auto-scroll-changed', { isEnabled: next.settings.autoScrollEnabled });
      }
      return;
    case 'updatePageSelectionActive':
      if (previous.ui.isPageSelectionActive && !next.ui.isPageSelectionActive) {
        bus.publish('page:selection-deactivated', {});
      }
      return;
    default:
      return;
  }
}

/**
 * Listen to `store:state-changed` and republish domain events.
 *
 * @returns The subscription; cancel it to stop.
 */
export function attachActionEvents(bus: EventBus): SubscriptionHandle<'store:state-changed'> {
  return bus.subscribe('store:state-changed', ({ action, previous, next }) =>
    publishActionEvents(bus, action, previous, next),
  );
}
