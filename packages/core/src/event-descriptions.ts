/**
 * @module event-descriptions
 * Stable, human-readable description of every event, for diagnostics.
 */

import type { EventName } from '@notecore/types';

export const EVENT_DESCRIPTIONS = {
  'page:selected': 'A page was selected',
  'page:selected-by-user': 'The user picked a page from the navigator',
  'page:selection-deactivated': 'Page selection was released',
  'page:added': 'A page was added to a note',
  'page:reordering': 'Pages were reordered',
  'page:visible-changed': 'The visible page changed',
  'page:scroll-to': 'Scroll the canvas to a page',
  'drawing:page-changed': 'A page drawing changed',
  'drawing:live-update': 'Drawing in progress',
  'drawing:started': 'A stroke started',
  'drawing:completed': 'A stroke completed',
  'template:refresh': 'Redraw the template',
  'template:force-refresh': 'Rebuild the template',
  'template:changed': 'The default template changed',
  'ui:sidebar-visibility-changed': 'The subject sidebar was shown or hidden',
  'ui:close-sidebar': 'Close the subject sidebar',
  'ui:toggle-sidebar': 'Toggle the subject sidebar',
  'grid:state-changed': 'The coordinate grid was shown or hidden',
  'grid:toggle': 'Toggle the coordinate grid',
  'system:debug-mode-changed': 'Debug mode changed',
  'system:auto-scroll-changed': 'The auto-scroll setting changed',
  'system:coordinator-ready': 'The scroll coordinator is ready',
  'store:state-changed': 'The store finished a dispatch',
  'store:action-ignored': 'A dispatched action changed nothing',
  'persistence:saved': 'Content was saved',
  'persistence:failed': 'Saving content failed',
} as const satisfies Record<EventName, string>;

/** Description of `event`. */
export function describeEvent(event: EventName): string {
  return EVENT_DESCRIPTIONS[event];
}
