/**
 * @module state
 * Application state tree. Replaced wholesale by the reducer pipeline only.
 */

import type { Id } from './common';
import type { CanvasTemplate, Subject } from './entities';

/** Current selection inside the content tree. Indices are derived, not stored. */
export interface SelectionState {
  readonly subjectId: Id | null;
  readonly noteId: Id | null;
  readonly pageId: Id | null;
  /** Index of the selected page within the selected note. */
  readonly pageIndex: number;
}

/** Domain content: every subject with its notes and pages. */
export interface ContentState {
  readonly subjects: readonly Subject[];
  readonly selection: SelectionState;
}

/** Where the user currently is. */
export type NavigationState =
  | { readonly kind: 'subjectsList' }
  | { readonly kind: 'noteDetail'; readonly noteIndex: number; readonly subjectId: Id };

/** Presentation flags. */
export interface UIState {
  readonly navigation: NavigationState;
  /** Whether the page navigator sidebar is shown. */
  readonly isPageNavigatorVisible: boolean;
  /** Whether a page is pinned as selected (disables free scrolling). */
  readonly isPageSelectionActive: boolean;
  /** Whether the subject sidebar is shown. */
  readonly isSubjectSidebarVisible: boolean;
  /** Whether the coordinate grid overlay is shown. */
  readonly isCoordinateGridVisible: boolean;
  /** Current search text for filtering subjects and notes. */
  readonly searchText: string;
  /** Enables per-dispatch diagnostic logging. */
  readonly isDebugMode: boolean;
}

/** How a subject's notes are laid out. */
export type ViewMode = 'grid' | 'list';

/** Note ordering key. */
export type SortOption = 'dateModified' | 'dateCreated' | 'title';

/** Note ordering direction. */
export type SortOrder = 'ascending' | 'descending';

/** User preferences and feature toggles. */
export interface SettingsState {
  readonly disableFingerDrawing: boolean;
  readonly autoScrollEnabled: boolean;
  /** Template given to newly created notes and pages. */
  readonly defaultTemplate: CanvasTemplate;
  readonly defaultViewMode: ViewMode;
  readonly defaultSortOption: SortOption;
  readonly defaultSortOrder: SortOrder;
}

/** The complete application state. */
export interface AppState {
  readonly content: ContentState;
  readonly ui: UIState;
  readonly settings: SettingsState;
}
