/**
 * Shared test data: one subject with two notes of two pages each, plus an
 * empty subject. Identifiers are fixed so expectations can name them.
 */

import type { AppState, Page } from '@notecore/types';
import { createNote, createPage, createSubject } from '../entity-factory';
import { createInitialState } from '../initial-state';

export const T0 = 1_000;

export function page(id: string, pageNumber: number): Page {
  return createPage({ id, pageNumber });
}

export function sampleState(): AppState {
  const algebra = createNote('Algebra', {
    id: 'note-algebra',
    now: T0,
    pages: [page('page-a1', 1), page('page-a2', 2)],
  });
  const geometry = createNote('Geometry', {
    id: 'note-geometry',
    now: T0,
    pages: [page('page-g1', 1), page('page-g2', 2)],
  });
  const math = createSubject('Math', {
    id: 'subject-math',
    colorName: 'blue',
    now: T0,
    notes: [algebra, geometry],
  });
  const history = createSubject('History', { id: 'subject-history', colorName: 'red', now: T0 });

  const base = createInitialState();
  return {
    ...base,
    content: {
      subjects: [math, history],
      selection: { subjectId: 'subject-math', noteId: null, pageId: null, pageIndex: 0 },
    },
  };
}

/** Every page id anywhere in the content tree. */
export function allPageIds(state: AppState): string[] {
  return state.content.subjects.flatMap((s) => s.notes.flatMap((n) => n.pages.map((p) => p.id)));
}
