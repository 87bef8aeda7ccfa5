/**
 * @module reducers/page-reducer
 * Page additions, replacements, deletions, reordering and selection.
 *
 * Every mutation touches the owning note and subject. Deleting or moving a
 * page renumbers `pageNumber` to match array order.
 */

import { castDraft } from 'immer';
import type { PageAction, Timestamp } from '@notecore/types';
import { createPage } from '../entity-factory';
import { findNote, renumberPages, touch, type ContentDraft } from './locate';

export function applyPageAction(content: ContentDraft, action: PageAction, now: Timestamp): void {
  switch (action.type) {
    case 'addPage': {
      const found = findNote(content, action.subjectId, action.noteId);
      if (!found) return;

      const { subject, note } = found;
      note.pages.push(castDraft(action.page));
      touch(subject, note, now);

      if (content.selection.noteId === note.id) {
        content.selection.pageIndex = note.pages.length - 1;
        content.selection.pageId = action.page.id;
      }
      return;
    }

    case 'updatePage': {
      const found = findNote(content, action.subjectId, action.noteId);
      const index = found ? found.note.pages.findIndex((p) => p.id === action.page.id) : -1;
      if (!found || index === -1) return;

      found.note.pages[index] = castDraft(action.page);
      touch(found.subject, found.note, now);
      return;
    }

    case 'deletePage': {
      const found = findNote(content, action.subjectId, action.noteId);
      const index = found ? found.note.pages.findIndex((p) => p.id === action.pageId) : -1;
      if (!found || index === -1) return;

      const { subject, note } = found;
      if (note.pages.length <= 1) {
        // A note always keeps one page: clear it instead of removing it.
        note.pages[0] = castDraft(
          createPage({ id: action.pageId, template: note.pages[0].template, pageNumber: 1 }),
        );
      } else {
        note.pages.splice(index, 1);
        renumberPages(note);

        const { selection } = content;
        if (selection.noteId === note.id && selection.pageIndex >= index) {
          const nextIndex = Math.max(0, Math.min(selection.pageIndex - 1, note.pages.length - 1));
          selection.pageIndex = nextIndex;
          selection.pageId = note.pages[nextIndex].id;
        }
      }
      touch(subject, note, now);
      return;
    }

    case 'reorderPages': {
      const found = findNote(content, action.subjectId, action.noteId);
      if (!found) return;

      const { subject, note } = found;
      const { fromIndex, toIndex } = action;
      const count = note.pages.length;
      if (fromIndex === toIndex || fromIndex < 0 || fromIndex >= count || toIndex < 0 || toIndex >= count) {
        return;
      }

      const [moved] = note.pages.splice(fromIndex, 1);
      note.pages.splice(toIndex, 0, moved);
      renumberPages(note);

      const { selection } = content;
      if (selection.noteId === note.id) {
        const selectedIndex =
          selection.pageId === null ? -1 : note.pages.findIndex((p) => p.id === selection.pageId);
        if (selectedIndex !== -1) {
          selection.pageIndex = selectedIndex;
        } else if (selection.pageIndex === fromIndex) {
          selection.pageIndex = toIndex;
        }
      }
      touch(subject, note, now);
      return;
    }

    case 'selectPage': {
      const { selection } = content;
      if (selection.subjectId === null || selection.noteId === null) return;

      const found = findNote(content, selection.subjectId, selection.noteId);
      const page = found?.note.pages[action.pageIndex];
      if (!page || action.pageIndex < 0) return;

      selection.pageIndex = action.pageIndex;
      selection.pageId = action.pageId ?? page.id;
      return;
    }
  }
}
