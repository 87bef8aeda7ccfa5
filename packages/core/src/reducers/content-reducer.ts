/**
 * @module reducers/content-reducer
 * Reducer for the content slice: subjects, notes, pages and selection.
 */

import { produce } from 'immer';
import type { Action, Clock, ContentState } from '@notecore/types';
import { applyNoteAction } from './note-reducer';
import { applyPageAction } from './page-reducer';
import { applySubjectAction } from './subject-reducer';
import { applyTemplateAction } from './template-reducer';

/**
 * Apply `action` to the content slice.
 * Returns `content` itself when the action does not apply.
 */
export function reduceContent(content: ContentState, action: Action, clock: Clock): ContentState {
  switch (action.category) {
    case 'subject':
      return produce(content, (draft) => applySubjectAction(draft, action));
    case 'note':
      return produce(content, (draft) => applyNoteAction(draft, action, clock.now()));
    case 'page':
      return produce(content, (draft) => applyPageAction(draft, action, clock.now()));
    case 'template':
      return produce(content, (draft) => applyTemplateAction(draft, action, clock.now()));
    default:
      return content;
  }
}
