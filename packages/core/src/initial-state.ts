/**
 * @module initial-state
 * Default application state and hydration from persisted subjects.
 */

import type { AppState, SelectionState, Subject } from '@notecore/types';
import { TEMPLATE_PRESETS } from './templates';

/** Selection with nothing selected. */
export const EMPTY_SELECTION: SelectionState = {
  subjectId: null,
  noteId: null,
  pageId: null,
  pageIndex: 0,
};

/**
 * Creates the state an app starts with before anything is loaded.
 */
export function createInitialState(): AppState {
  return {
    content: {
      subjects: [],
      selection: EMPTY_SELECTION,
    },
    ui: {
      navigation: { kind: 'subjectsList' },
      isPageNavigatorVisible: false,
      isPageSelectionActive: false,
      isSubjectSidebarVisible: true,
      isCoordinateGridVisible: false,
      searchText: '',
      isDebugMode: false,
    },
    settings: {
      disableFingerDrawing: false,
      autoScrollEnabled: true,
      defaultTemplate: TEMPLATE_PRESETS.none,
      defaultViewMode: 'grid',
      defaultSortOption: 'dateModified',
      defaultSortOrder: 'descending',
    },
  };
}

/**
 * Builds a fresh state around subjects read from persistence.
 * The first subject, if any, starts out selected.
 *
 * @param subjects - Subjects as loaded, in display order.
 */
export function hydrateState(subjects: readonly Subject[]): AppState {
  const base = createInitialState();
  const first = subjects[0];
  return {
    ...base,
    content: {
      subjects,
      selection: first ? { ...EMPTY_SELECTION, subjectId: first.id } : EMPTY_SELECTION,
    },
  };
}
