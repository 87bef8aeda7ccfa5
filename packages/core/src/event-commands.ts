/**
 * @module event-commands
 * Turns request events (toggle the sidebar, pick a page, ...) into actions.
 */

import type { EventBus } from '@notecore/types';
import { navigationActions, pageActions } from './actions';
import type { Store } from './store';
import { SubscriptionManager } from './subscription-manager';

/**
 * Subscribe `store` to the request events it handles.
 *
 * @returns The manager holding the subscriptions; call `clearAll()` on teardown.
 */
export function bindEventCommands(bus: EventBus, store: Store): SubscriptionManager {
  const subscriptions = new SubscriptionManager(bus);

  subscriptions.subscribe('ui:toggle-sidebar', () => {
    const visible = store.getState().ui.isSubjectSidebarVisible;
    store.dispatch(navigationActions.setSubjectSidebarVisible(!visible));
  });

  subscriptions.subscribe('ui:close-sidebar', () => {
    store.dispatch(navigationActions.setSubjectSidebarVisible(false));
  });

  subscriptions.subscribe('grid:toggle', () => {
    const visible = store.getState().ui.isCoordinateGridVisible;
    store.dispatch(navigationActions.setCoordinateGridVisible(!visible));
  });

  // A page picked from the thumbnail strip pins the selection.
  subscriptions.subscribe('page:selected-by-user', ({ pageIndex }) => {
    store.dispatch(pageActions.select(pageIndex));
    store.dispatch(navigationActions.setPageSelectionActive(true));
  });

  return subscriptions;
}
