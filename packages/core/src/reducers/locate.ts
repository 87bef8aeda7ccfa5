/**
 * @module reducers/locate
 * Identifier lookups inside a content draft. Every lookup returns
 * `undefined` when the entity is missing so callers can fall through to a no-op.
 */

import type { Draft } from 'immer';
import type { ContentState, Id, Note, Subject, Timestamp } from '@notecore/types';

export type ContentDraft = Draft<ContentState>;
export type SubjectDraft = Draft<Subject>;
export type NoteDraft = Draft<Note>;

export function findSubject(content: ContentDraft, subjectId: Id): SubjectDraft | undefined {
  return content.subjects.find((s) => s.id === subjectId);
}

export function findNote(
  content: ContentDraft,
  subjectId: Id,
  noteId: Id,
): { subject: SubjectDraft; note: NoteDraft } | undefined {
  const subject = findSubject(content, subjectId);
  const note = subject?.notes.find((n) => n.id === noteId);
  return subject && note ? { subject, note } : undefined;
}

/** Record a content mutation on the owning subject and, when given, the note. */
export function touch(subject: SubjectDraft, note: NoteDraft | null, now: Timestamp): void {
  subject.lastModified = now;
  if (note) note.lastModified = now;
}

/** Rewrite `pageNumber` so it matches array position (1-based). */
export function renumberPages(note: NoteDraft): void {
  note.pages.forEach((page, index) => {
    page.pageNumber = index + 1;
  });
}

/** Drop note and page selection, keeping the subject. */
export function clearNoteSelection(content: ContentDraft): void {
  content.selection.noteId = null;
  content.selection.pageId = null;
  content.selection.pageIndex = 0;
}
