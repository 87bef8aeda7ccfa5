/**
 * @module reducers/template-reducer
 * Note and page template changes. The default template lives in the
 * settings slice and is handled by the settings reducer.
 */

import { castDraft } from 'immer';
import type { TemplateAction, Timestamp } from '@notecore/types';
import { findNote, touch, type ContentDraft } from './locate';

export function applyTemplateAction(content: ContentDraft, action: TemplateAction, now: Timestamp): void {
  switch (action.type) {
    case 'setNoteTemplate': {
      const found = findNote(content, action.subjectId, action.noteId);
      if (!found) return;

      found.note.noteTemplate = castDraft(action.template);
      touch(found.subject, found.note, now);
      return;
    }

    case 'setPageTemplate': {
      const found = findNote(content, action.subjectId, action.noteId);
      const page = found?.note.pages.find((p) => p.id === action.pageId);
      if (!found || !page) return;

      page.template = castDraft(action.template);
      touch(found.subject, found.note, now);
      return;
    }

    case 'setDefaultTemplate':
      return;
  }
}
