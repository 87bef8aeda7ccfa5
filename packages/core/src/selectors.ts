/**
 * @module selectors
 * Derived values. The state stores identifiers only; positions, entities and
 * filtered views are computed here on demand.
 */

import type { AppState, CanvasTemplate, Note, Page, SortOption, SortOrder, Subject } from '@notecore/types';

export function selectSelectedSubject(state: AppState): Subject | null {
  const { subjectId } = state.content.selection;
  if (subjectId === null) return null;
  return state.content.subjects.find((s) => s.id === subjectId) ?? null;
}

/** Position of the selected subject, or -1. */
export function selectSelectedSubjectIndex(state: AppState): number {
  const { subjectId } = state.content.selection;
  return state.content.subjects.findIndex((s) => s.id === subjectId);
}

export function selectSelectedNote(state: AppState): Note | null {
  const { noteId } = state.content.selection;
  if (noteId === null) return null;
  return selectSelectedSubject(state)?.notes.find((n) => n.id === noteId) ?? null;
}

/** Position of the selected note within its subject, or -1. */
export function selectSelectedNoteIndex(state: AppState): number {
  const subject = selectSelectedSubject(state);
  const { noteId } = state.content.selection;
  return subject ? subject.notes.findIndex((n) => n.id === noteId) : -1;
}

export function selectSelectedPage(state: AppState): Page | null {
  const note = selectSelectedNote(state);
  if (!note) return null;
  const { pageId, pageIndex } = state.content.selection;
  return note.pages.find((p) => p.id === pageId) ?? note.pages[pageIndex] ?? null;
}

/**
 * Template that applies to the selected page: its own, else its note's,
 * else the default.
 */
export function selectEffectiveTemplate(state: AppState): CanvasTemplate {
  return (
    selectSelectedPage(state)?.template ?? selectSelectedNote(state)?.noteTemplate ?? state.settings.defaultTemplate
  );
}

function matches(text: string, query: string): boolean {
  return text.toLowerCase().includes(query);
}

/**
 * Subjects matching the search text by name or by one of their note titles.
 * All subjects when the search text is blank.
 */
export function selectVisibleSubjects(state: AppState): readonly Subject[] {
  const query = state.ui.searchText.trim().toLowerCase();
  if (query === '') return state.content.subjects;
  return state.content.subjects.filter(
    (subject) => matches(subject.name, query) || subject.notes.some((note) => matches(note.title, query)),
  );
}

/** Sort notes by `option` in `order`, leaving the input untouched. */
export function sortNotes(notes: readonly Note[], option: SortOption, order: SortOrder): Note[] {
  const compare = (a: Note, b: Note): number => {
    switch (option) {
      case 'title':
        return a.title.localeCompare(b.title);
      case 'dateCreated':
        return a.dateCreated - b.dateCreated;
      case 'dateModified':
        return a.lastModified - b.lastModified;
    }
  };
  const sorted = [...notes].sort(compare);
  return order === 'ascending' ? sorted : sorted.reverse();
}

/**
 * Notes of the selected subject that match the search text, ordered by the
 * default sort settings. Empty when no subject is selected.
 */
export function selectVisibleNotes(state: AppState): Note[] {
  const subject = selectSelectedSubject(state);
  if (!subject) return [];
  const query = state.ui.searchText.trim().toLowerCase();
  const notes = query === '' ? subject.notes : subject.notes.filter((note) => matches(note.title, query));
  return sortNotes(notes, state.settings.defaultSortOption, state.settings.defaultSortOrder);
}
