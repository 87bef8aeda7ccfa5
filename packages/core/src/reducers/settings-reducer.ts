/**
 * @module reducers/settings-reducer
 * Reducer for the settings slice.
 */

import { castDraft, produce } from 'immer';
import type { Action, SettingsState } from '@notecore/types';

/**
 * Apply `action` to the settings slice.
 * Returns `settings` itself when the action does not apply.
 */
export function reduceSettings(settings: SettingsState, action: Action): SettingsState {
  return produce(settings, (draft) => {
    switch (action.type) {
      case 'updateFingerDrawingSetting':
        draft.disableFingerDrawing = action.isDisabled;
        return;
      case 'updateAutoScrollSetting':
        draft.autoScrollEnabled = action.isEnabled;
        return;
      case 'setDefaultTemplate':
        draft.defaultTemplate = castDraft(action.template);
        return;
      case 'updateDefaultViewMode':
        draft.defaultViewMode = action.viewMode;
        return;
      case 'updateDefaultSort':
        draft.defaultSortOption = action.sortOption;
        draft.defaultSortOrder = action.sortOrder;
        return;
      default:
        return;
    }
  });
}
