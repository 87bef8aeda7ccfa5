import { describe, expect, it } from 'vitest';
import { noteActions, pageActions, subjectActions } from '../actions';
import { fixedClock } from '../clock';
import { sameEntity } from '../entity-factory';
import { reduce } from '../reducers';
import { T0, allPageIds, page, sampleState } from './fixtures';

describe('reduce', () => {
  it('is deterministic for a fixed state, action and clock', () => {
    const state = sampleState();
    const action = pageActions.add(page('page-a3', 3), 'note-algebra', 'subject-math');

    const first = reduce(state, action, fixedClock(42));
    const second = reduce(state, action, fixedClock(42));

    expect(second).toEqual(first);
    expect(
      second.content.subjects.every((subject, i) => sameEntity(subject, first.content.subjects[i])),
    ).toBe(true);
  });

  it('does not mutate its input', () => {
    const state = sampleState();
    const snapshot = JSON.stringify(state);

    reduce(state, subjectActions.delete('subject-math'));
    reduce(state, pageActions.reorder(1, 0, 'note-algebra', 'subject-math'));

    expect(JSON.stringify(state)).toBe(snapshot);
  });

  it('returns the input state when a note update targets a missing subject', () => {
    const state = sampleState();
    const note = state.content.subjects[0].notes[0];

    expect(reduce(state, noteActions.update(note, 'subject-x'))).toBe(state);
  });

  it('cascades a subject delete to its notes and pages', () => {
    const state = sampleState();
    expect(allPageIds(state)).toHaveLength(4);

    const next = reduce(state, subjectActions.delete('subject-math'));

    expect(next.content.subjects.some((s) => s.id === 'subject-math')).toBe(false);
    expect(allPageIds(next)).toHaveLength(0);
  });

  it('touches the owning subject when a page is added', () => {
    const state = sampleState();
    const next = reduce(state, pageActions.add(page('page-a3', 3), 'note-algebra', 'subject-math'), fixedClock(T0 + 1));

    expect(next.content.subjects[0].lastModified).toBeGreaterThanOrEqual(state.content.subjects[0].lastModified);
    expect(next.content.subjects[0].lastModified).toBe(T0 + 1);
    expect(next.content.subjects[1]).toBe(state.content.subjects[1]);
  });

  it('renumbers pages after a reorder', () => {
    const withThree = reduce(sampleState(), pageActions.add(page('page-a3', 3), 'note-algebra', 'subject-math'));
    const next = reduce(withThree, pageActions.reorder(2, 0, 'note-algebra', 'subject-math'));
    const pages = next.content.subjects[0].notes[0].pages;

    expect(pages.map((p) => p.id)).toEqual(['page-a3', 'page-a1', 'page-a2']);
    expect(pages.map((p) => p.pageNumber)).toEqual([1, 2, 3]);
  });

  it('freezes the produced state', () => {
    const next = reduce(sampleState(), subjectActions.delete('subject-history'));

    expect(Object.isFrozen(next)).toBe(true);
    expect(Object.isFrozen(next.content.subjects)).toBe(true);
  });
});
