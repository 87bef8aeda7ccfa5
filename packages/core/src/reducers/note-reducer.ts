/**
 * @module reducers/note-reducer
 * Note additions, replacements, deletions and selection within a subject.
 */

import { castDraft } from 'immer';
import type { NoteAction, Timestamp } from '@notecore/types';
import { clearNoteSelection, findNote, findSubject, touch, type ContentDraft } from './locate';

export function applyNoteAction(content: ContentDraft, action: NoteAction, now: Timestamp): void {
  switch (action.type) {
    case 'addNote': {
      const subject = findSubject(content, action.subjectId);
      if (!subject) return;

      subject.notes.push(castDraft(action.note));
      touch(subject, null, now);

      content.selection.subjectId = subject.id;
      content.selection.noteId = action.note.id;
      content.selection.pageIndex = 0;
      content.selection.pageId = action.note.pages[0]?.id ?? null;
      return;
    }

    case 'updateNote': {
      const found = findNote(content, action.subjectId, action.note.id);
      if (!found) return;

      const { subject } = found;
      const index = subject.notes.findIndex((n) => n.id === action.note.id);
      subject.notes[index] = castDraft({ ...action.note, lastModified: now });
      touch(subject, null, now);
      return;
    }

    case 'deleteNote': {
      const subject = findSubject(content, action.subjectId);
      const index = subject ? subject.notes.findIndex((n) => n.id === action.noteId) : -1;
      if (!subject || index === -1) return;

      subject.notes.splice(index, 1);
      touch(subject, null, now);

      if (content.selection.noteId === action.noteId) {
        clearNoteSelection(content);
      }
      return;
    }

    case 'selectNote': {
      if (action.noteId === null || action.subjectId === null) {
        clearNoteSelection(content);
        return;
      }
      const subject = findSubject(content, action.subjectId);
      if (!subject) return;

      content.selection.subjectId = subject.id;
      const note = subject.notes.find((n) => n.id === action.noteId);
      if (!note) return;

      content.selection.noteId = note.id;
      content.selection.pageIndex = 0;
      content.selection.pageId = note.pages[0]?.id ?? null;
      return;
    }
  }
}
