/**
 * @module reducers/ui-reducer
 * Reducer for the UI slice: navigation, panel visibility, search text and
 * debug mode.
 */

import { produce } from 'immer';
import type { Action, UIState } from '@notecore/types';

/**
 * Apply `action` to the UI slice.
 * Returns `ui` itself when the action does not apply.
 */
export function reduceUI(ui: UIState, action: Action): UIState {
  return produce(ui, (draft) => {
    switch (action.type) {
      case 'navigateToSubjectsList':
        if (draft.navigation.kind !== 'subjectsList') {
          draft.navigation = { kind: 'subjectsList' };
        }
        return;
      case 'navigateToNote':
        draft.navigation = { kind: 'noteDetail', noteIndex: action.noteIndex, subjectId: action.subjectId };
        return;
      case 'updatePageNavigatorVisibility':
        draft.isPageNavigatorVisible = action.isVisible;
        return;
      case 'updateSubjectSidebarVisibility':
        draft.isSubjectSidebarVisible = action.isVisible;
        return;
      case 'updatePageSelectionActive':
        draft.isPageSelectionActive = action.isActive;
        return;
      case 'updateCoordinateGridVisibility':
        draft.isCoordinateGridVisible = action.isVisible;
        return;
      case 'updateDebugModeSetting':
        draft.isDebugMode = action.isEnabled;
        return;
      case 'updateSearchText':
        draft.searchText = action.text;
        return;
      case 'deleteSubject':
        // Leave a note view whose subject no longer exists.
        if (draft.navigation.kind === 'noteDetail' && draft.navigation.subjectId === action.subjectId) {
          draft.navigation = { kind: 'subjectsList' };
        }
        return;
      default:
        return;
    }
  });
}
