/**
 * @module actions
 * The closed set of state mutations. Actions are plain data: no functions,
 * no mutable references, so reduction stays deterministic and replayable.
 *
 * Every variant carries its `category` (which reducer handles it) and its
 * `type` (what it does within that category).
 */

import type { Id } from './common';
import type { CanvasTemplate, Note, Page, Subject } from './entities';
import type { SortOption, SortOrder, ViewMode } from './state';

/** Subject management. */
export type SubjectAction =
  | { readonly category: 'subject'; readonly type: 'addSubject'; readonly subject: Subject }
  | { readonly category: 'subject'; readonly type: 'updateSubject'; readonly subject: Subject }
  | { readonly category: 'subject'; readonly type: 'deleteSubject'; readonly subjectId: Id }
  | { readonly category: 'subject'; readonly type: 'selectSubject'; readonly subjectId: Id | null };

/** Note management within a subject. */
export type NoteAction =
  | { readonly category: 'note'; readonly type: 'addNote'; readonly note: Note; readonly subjectId: Id }
  | { readonly category: 'note'; readonly type: 'updateNote'; readonly note: Note; readonly subjectId: Id }
  | { readonly category: 'note'; readonly type: 'deleteNote'; readonly noteId: Id; readonly subjectId: Id }
  | {
      readonly category: 'note';
      readonly type: 'selectNote';
      readonly noteId: Id | null;
      readonly subjectId: Id | null;
    };

/** Page management within a note. */
export type PageAction =
  | {
      readonly category: 'page';
      readonly type: 'addPage';
      readonly page: Page;
      readonly noteId: Id;
      readonly subjectId: Id;
    }
  | {
      readonly category: 'page';
      readonly type: 'updatePage';
      readonly page: Page;
      readonly noteId: Id;
      readonly subjectId: Id;
    }
  | {
      readonly category: 'page';
      readonly type: 'deletePage';
      readonly pageId: Id;
      readonly noteId: Id;
      readonly subjectId: Id;
    }
  | {
      readonly category: 'page';
      readonly type: 'reorderPages';
      readonly fromIndex: number;
      readonly toIndex: number;
      readonly noteId: Id;
      readonly subjectId: Id;
    }
  | {
      readonly category: 'page';
      readonly type: 'selectPage';
      readonly pageIndex: number;
      readonly pageId: Id | null;
    };

/** Background template changes. */
export type TemplateAction =
  | {
      readonly category: 'template';
      readonly type: 'setNoteTemplate';
      readonly template: CanvasTemplate;
      readonly noteId: Id;
      readonly subjectId: Id;
    }
  | {
      readonly category: 'template';
      readonly type: 'setPageTemplate';
      readonly template: CanvasTemplate;
      readonly pageId: Id;
      readonly noteId: Id;
      readonly subjectId: Id;
    }
  | { readonly category: 'template'; readonly type: 'setDefaultTemplate'; readonly template: CanvasTemplate };

/** Navigation and panel visibility. */
export type NavigationAction =
  | { readonly category: 'navigation'; readonly type: 'navigateToSubjectsList' }
  | {
      readonly category: 'navigation';
      readonly type: 'navigateToNote';
      readonly noteIndex: number;
      readonly subjectId: Id;
    }
  | { readonly category: 'navigation'; readonly type: 'updatePageNavigatorVisibility'; readonly isVisible: boolean }
  | { readonly category: 'navigation'; readonly type: 'updateSubjectSidebarVisibility'; readonly isVisible: boolean }
  | { readonly category: 'navigation'; readonly type: 'updatePageSelectionActive'; readonly isActive: boolean }
  | { readonly category: 'navigation'; readonly type: 'updateCoordinateGridVisibility'; readonly isVisible: boolean };

/** Preferences, debug mode and search text. */
export type SettingsAction =
  | { readonly category: 'settings'; readonly type: 'updateFingerDrawingSetting'; readonly isDisabled: boolean }
  | { readonly category: 'settings'; readonly type: 'updateAutoScrollSetting'; readonly isEnabled: boolean }
  | { readonly category: 'settings'; readonly type: 'updateDebugModeSetting'; readonly isEnabled: boolean }
  | { readonly category: 'settings'; readonly type: 'updateSearchText'; readonly text: string }
  | { readonly category: 'settings'; readonly type: 'updateDefaultViewMode'; readonly viewMode: ViewMode }
  | {
      readonly category: 'settings';
      readonly type: 'updateDefaultSort';
      readonly sortOption: SortOption;
      readonly sortOrder: SortOrder;
    };

/** Any action the store accepts. */
export type Action =
  | SubjectAction
  | NoteAction
  | PageAction
  | TemplateAction
  | NavigationAction
  | SettingsAction;

/** The six action categories. */
export type ActionCategory = Action['category'];

/** Action variants of a single category. */
export type ActionOf<C extends ActionCategory> = Extract<Action, { category: C }>;
