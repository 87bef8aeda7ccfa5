/**
 * @module reducers/subject-reducer
 * Subject additions, replacements, deletions and selection.
 */

import { castDraft } from 'immer';
import type { SubjectAction } from '@notecore/types';
import { clearNoteSelection, findSubject, type ContentDraft } from './locate';

export function applySubjectAction(content: ContentDraft, action: SubjectAction): void {
  switch (action.type) {
    case 'addSubject': {
      content.subjects.push(castDraft(action.subject));
      if (content.selection.subjectId === null) {
        content.selection.subjectId = action.subject.id;
      }
      return;
    }

    case 'updateSubject': {
      const index = content.subjects.findIndex((s) => s.id === action.subject.id);
      if (index !== -1) content.subjects[index] = castDraft(action.subject);
      return;
    }

    case 'deleteSubject': {
      const index = content.subjects.findIndex((s) => s.id === action.subjectId);
      if (index === -1) return;

      // The subject value owns its notes and pages, so removing it removes them too.
      content.subjects.splice(index, 1);

      if (content.selection.subjectId === action.subjectId) {
        clearNoteSelection(content);
        content.selection.subjectId = content.subjects[0]?.id ?? null;
      }
      return;
    }

    case 'selectSubject': {
      if (action.subjectId === null) {
        content.selection.subjectId = null;
        clearNoteSelection(content);
        return;
      }
      if (!findSubject(content, action.subjectId)) return;

      content.selection.subjectId = action.subjectId;
      clearNoteSelection(content);
      return;
    }
  }
}
