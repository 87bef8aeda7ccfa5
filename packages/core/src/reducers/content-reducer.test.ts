import { describe, expect, it } from 'vitest';
import type { AppState } from '@notecore/types';
import { noteActions, pageActions, subjectActions, templateActions } from '../actions';
import { fixedClock } from '../clock';
import { createNote, createPage, createSubject } from '../entity-factory';
import { createInitialState } from '../initial-state';
import { TEMPLATE_PRESETS } from '../templates';
import { T0, allPageIds, page, sampleState } from '../__tests__/fixtures';
import { reduce } from './index';

const T1 = 5_000;
const clock = fixedClock(T1);

function math(state: AppState) {
  const subject = state.content.subjects.find((s) => s.id === 'subject-math');
  if (!subject) throw new Error('math subject missing');
  return subject;
}

function algebra(state: AppState) {
  const note = math(state).notes.find((n) => n.id === 'note-algebra');
  if (!note) throw new Error('algebra note missing');
  return note;
}

// ── subjects ─────────────────────────────────────────────────────────

describe('subject actions', () => {
  it('appends added subjects to the end', () => {
    const biology = createSubject('Biology', { id: 'subject-bio', now: T0 });
    const next = reduce(sampleState(), subjectActions.add(biology), clock);

    expect(next.content.subjects.map((s) => s.id)).toEqual(['subject-math', 'subject-history', 'subject-bio']);
    expect(next.content.selection.subjectId).toBe('subject-math');
  });

  it('selects the added subject when nothing is selected', () => {
    const biology = createSubject('Biology', { id: 'subject-bio', now: T0 });
    const next = reduce(createInitialState(), subjectActions.add(biology), clock);

    expect(next.content.selection.subjectId).toBe('subject-bio');
  });

  it('replaces a subject by id', () => {
    const state = sampleState();
    const renamed = { ...math(state), name: 'Mathematics' };
    const next = reduce(state, subjectActions.update(renamed), clock);

    expect(math(next).name).toBe('Mathematics');
    expect(next.content.subjects).toHaveLength(2);
  });

  it('ignores updates to unknown subjects', () => {
    const state = sampleState();
    const ghost = createSubject('Ghost', { id: 'subject-ghost' });

    expect(reduce(state, subjectActions.update(ghost), clock)).toBe(state);
  });

  it('removes a deleted subject together with its notes and pages', () => {
    const next = reduce(sampleState(), subjectActions.delete('subject-math'), clock);

    expect(next.content.subjects.map((s) => s.id)).toEqual(['subject-history']);
    expect(allPageIds(next)).toEqual([]);
  });

  it('moves the selection to the first remaining subject when the selected one is deleted', () => {
    const state = reduce(sampleState(), noteActions.select('note-algebra', 'subject-math'), clock);
    const next = reduce(state, subjectActions.delete('subject-math'), clock);

    expect(next.content.selection).toEqual({
      subjectId: 'subject-history',
      noteId: null,
      pageId: null,
      pageIndex: 0,
    });
  });

  it('keeps the selection when another subject is deleted', () => {
    const next = reduce(sampleState(), subjectActions.delete('subject-history'), clock);

    expect(next.content.selection.subjectId).toBe('subject-math');
  });

  it('clears the whole selection when selecting null', () => {
    const state = reduce(sampleState(), noteActions.select('note-algebra', 'subject-math'), clock);
    const next = reduce(state, subjectActions.select(null), clock);

    expect(next.content.selection).toEqual({ subjectId: null, noteId: null, pageId: null, pageIndex: 0 });
  });

  it('ignores selection of an unknown subject', () => {
    const state = sampleState();
    expect(reduce(state, subjectActions.select('subject-ghost'), clock)).toBe(state);
  });
});

// ── notes ────────────────────────────────────────────────────────────

describe('note actions', () => {
  it('appends the note, selects it and touches the subject', () => {
    const calculus = createNote('Calculus', { id: 'note-calc', now: T0, pages: [page('page-c1', 1)] });
    const next = reduce(sampleState(), noteActions.add(calculus, 'subject-math'), clock);

    expect(math(next).notes.map((n) => n.id)).toEqual(['note-algebra', 'note-geometry', 'note-calc']);
    expect(math(next).lastModified).toBe(T1);
    expect(next.content.selection).toEqual({
      subjectId: 'subject-math',
      noteId: 'note-calc',
      pageId: 'page-c1',
      pageIndex: 0,
    });
  });

  it('leaves state unchanged when updating a note in a missing subject', () => {
    const state = sampleState();
    const edited = { ...algebra(state), title: 'Linear Algebra' };

    expect(reduce(state, noteActions.update(edited, 'subject-ghost'), clock)).toBe(state);
  });

  it('leaves state unchanged when updating a note the subject does not own', () => {
    const state = sampleState();
    const stranger = createNote('Stranger', { id: 'note-stranger' });

    expect(reduce(state, noteActions.update(stranger, 'subject-math'), clock)).toBe(state);
  });

  it('replaces the note and stamps it and its subject', () => {
    const state = sampleState();
    const edited = { ...algebra(state), title: 'Linear Algebra' };
    const next = reduce(state, noteActions.update(edited, 'subject-math'), clock);

    expect(algebra(next).title).toBe('Linear Algebra');
    expect(algebra(next).lastModified).toBe(T1);
    expect(math(next).lastModified).toBe(T1);
  });

  it('deletes a note and clears its selection', () => {
    const state = reduce(sampleState(), noteActions.select('note-algebra', 'subject-math'), clock);
    const next = reduce(state, noteActions.delete('note-algebra', 'subject-math'), clock);

    expect(math(next).notes.map((n) => n.id)).toEqual(['note-geometry']);
    expect(next.content.selection).toEqual({
      subjectId: 'subject-math',
      noteId: null,
      pageId: null,
      pageIndex: 0,
    });
  });

  it('selects a note and its first page', () => {
    const next = reduce(sampleState(), noteActions.select('note-geometry', 'subject-math'), clock);

    expect(next.content.selection).toEqual({
      subjectId: 'subject-math',
      noteId: 'note-geometry',
      pageId: 'page-g1',
      pageIndex: 0,
    });
  });
});

// ── pages ────────────────────────────────────────────────────────────

describe('page actions', () => {
  it('appends a page and touches the note and subject', () => {
    const state = sampleState();
    const before = math(state).lastModified;
    const next = reduce(state, pageActions.add(page('page-a3', 3), 'note-algebra', 'subject-math'), clock);

    expect(algebra(next).pages.map((p) => p.id)).toEqual(['page-a1', 'page-a2', 'page-a3']);
    expect(algebra(next).lastModified).toBe(T1);
    expect(math(next).lastModified).toBeGreaterThanOrEqual(before);
    expect(math(next).lastModified).toBe(T1);
  });

  it('selects an added page when its note is selected', () => {
    const state = reduce(sampleState(), noteActions.select('note-algebra', 'subject-math'), clock);
    const next = reduce(state, pageActions.add(page('page-a3', 3), 'note-algebra', 'subject-math'), clock);

    expect(next.content.selection.pageIndex).toBe(2);
    expect(next.content.selection.pageId).toBe('page-a3');
  });

  it('ignores updates to unknown pages', () => {
    const state = sampleState();
    const stray = page('page-stray', 1);

    expect(reduce(state, pageActions.update(stray, 'note-algebra', 'subject-math'), clock)).toBe(state);
  });

  it('replaces a page by id', () => {
    const state = sampleState();
    const bookmarked = { ...algebra(state).pages[1], isBookmarked: true };
    const next = reduce(state, pageActions.update(bookmarked, 'note-algebra', 'subject-math'), clock);

    expect(algebra(next).pages[1].isBookmarked).toBe(true);
    expect(math(next).lastModified).toBe(T1);
  });

  it('deletes a page and renumbers the rest', () => {
    const next = reduce(sampleState(), pageActions.delete('page-a1', 'note-algebra', 'subject-math'), clock);

    expect(algebra(next).pages.map((p) => [p.id, p.pageNumber])).toEqual([['page-a2', 1]]);
  });

  it('clears the last remaining page instead of removing it', () => {
    let state = reduce(sampleState(), pageActions.delete('page-a1', 'note-algebra', 'subject-math'), clock);
    state = reduce(
      state,
      pageActions.update(
        createPage({ id: 'page-a2', pageNumber: 1, drawingData: new Uint8Array([1, 2, 3]), template: TEMPLATE_PRESETS.lined }),
        'note-algebra',
        'subject-math',
      ),
      clock,
    );
    const next = reduce(state, pageActions.delete('page-a2', 'note-algebra', 'subject-math'), clock);

    const pages = algebra(next).pages;
    expect(pages).toHaveLength(1);
    expect(pages[0].id).toBe('page-a2');
    expect(pages[0].drawingData).toHaveLength(0);
    expect(pages[0].template).toEqual(TEMPLATE_PRESETS.lined);
    expect(pages[0].pageNumber).toBe(1);
  });

  it('moves the selection back when an earlier page is deleted', () => {
    let state = reduce(sampleState(), noteActions.select('note-algebra', 'subject-math'), clock);
    state = reduce(state, pageActions.select(1), clock);
    const next = reduce(state, pageActions.delete('page-a1', 'note-algebra', 'subject-math'), clock);

    expect(next.content.selection.pageIndex).toBe(0);
    expect(next.content.selection.pageId).toBe('page-a2');
  });

  it('reorders pages and renumbers them to match the new order', () => {
    const state = reduce(sampleState(), pageActions.add(page('page-a3', 3), 'note-algebra', 'subject-math'), clock);
    const next = reduce(state, pageActions.reorder(2, 0, 'note-algebra', 'subject-math'), clock);

    expect(algebra(next).pages.map((p) => p.id)).toEqual(['page-a3', 'page-a1', 'page-a2']);
    expect(algebra(next).pages.map((p) => p.pageNumber)).toEqual([1, 2, 3]);
  });

  it('keeps the selected page selected when it moves', () => {
    let state = reduce(sampleState(), pageActions.add(page('page-a3', 3), 'note-algebra', 'subject-math'), clock);
    state = reduce(state, noteActions.select('note-algebra', 'subject-math'), clock);
    const next = reduce(state, pageActions.reorder(0, 2, 'note-algebra', 'subject-math'), clock);

    expect(algebra(next).pages.map((p) => p.id)).toEqual(['page-a2', 'page-a3', 'page-a1']);
    expect(next.content.selection.pageIndex).toBe(2);
    expect(next.content.selection.pageId).toBe('page-a1');
  });

  it.each([
    [0, 0],
    [-1, 1],
    [0, 2],
    [5, 0],
  ])('ignores reorder from %i to %i', (from, to) => {
    const state = sampleState();
    expect(reduce(state, pageActions.reorder(from, to, 'note-algebra', 'subject-math'), clock)).toBe(state);
  });

  it('selects a page of the selected note by index', () => {
    const state = reduce(sampleState(), noteActions.select('note-algebra', 'subject-math'), clock);
    const next = reduce(state, pageActions.select(1), clock);

    expect(next.content.selection.pageIndex).toBe(1);
    expect(next.content.selection.pageId).toBe('page-a2');
  });

  it('ignores page selection without a selected note or with an index out of range', () => {
    const state = sampleState();
    expect(reduce(state, pageActions.select(0), clock)).toBe(state);

    const withNote = reduce(state, noteActions.select('note-algebra', 'subject-math'), clock);
    expect(reduce(withNote, pageActions.select(7), clock)).toBe(withNote);
  });
});

// ── templates ────────────────────────────────────────────────────────

describe('template actions', () => {
  it('sets a note template and touches the subject', () => {
    const next = reduce(
      sampleState(),
      templateActions.setNoteTemplate(TEMPLATE_PRESETS.graph, 'note-algebra', 'subject-math'),
      clock,
    );

    expect(algebra(next).noteTemplate).toEqual(TEMPLATE_PRESETS.graph);
    expect(math(next).lastModified).toBe(T1);
  });

  it('sets a page template', () => {
    const next = reduce(
      sampleState(),
      templateActions.setPageTemplate(TEMPLATE_PRESETS.dotted, 'page-a2', 'note-algebra', 'subject-math'),
      clock,
    );

    expect(algebra(next).pages[1].template).toEqual(TEMPLATE_PRESETS.dotted);
    expect(algebra(next).pages[0].template).toBeNull();
  });

  it('changes the default template without touching content', () => {
    const state = sampleState();
    const next = reduce(state, templateActions.setDefaultTemplate(TEMPLATE_PRESETS.lined), clock);

    expect(next.settings.defaultTemplate).toEqual(TEMPLATE_PRESETS.lined);
    expect(next.content).toBe(state.content);
  });
});
