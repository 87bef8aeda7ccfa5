/**
 * @module actions
 * Action creators grouped by category, and the human-readable descriptions
 * used by debug logging.
 */

import type {
  Action,
  ActionCategory,
  CanvasTemplate,
  Id,
  NavigationAction,
  Note,
  NoteAction,
  Page,
  PageAction,
  SettingsAction,
  SortOption,
  SortOrder,
  Subject,
  SubjectAction,
  TemplateAction,
  ViewMode,
} from '@notecore/types';

/** Subject action creators. */
export const subjectActions = {
  add: (subject: Subject): SubjectAction => ({ category: 'subject', type: 'addSubject', subject }),
  update: (subject: Subject): SubjectAction => ({ category: 'subject', type: 'updateSubject', subject }),
  delete: (subjectId: Id): SubjectAction => ({ category: 'subject', type: 'deleteSubject', subjectId }),
  select: (subjectId: Id | null): SubjectAction => ({
    category: 'subject',
    type: 'selectSubject',
    subjectId,
  }),
};

/** Note action creators. */
export const noteActions = {
  add: (note: Note, subjectId: Id): NoteAction => ({ category: 'note', type: 'addNote', note, subjectId }),
  update: (note: Note, subjectId: Id): NoteAction => ({
    category: 'note',
    type: 'updateNote',
    note,
    subjectId,
  }),
  delete: (noteId: Id, subjectId: Id): NoteAction => ({
    category: 'note',
    type: 'deleteNote',
    noteId,
    subjectId,
  }),
  select: (noteId: Id | null, subjectId: Id | null): NoteAction => ({
    category: 'note',
    type: 'selectNote',
    noteId,
    subjectId,
  }),
};

/** Page action creators. */
export const pageActions = {
  add: (page: Page, noteId: Id, subjectId: Id): PageAction => ({
    category: 'page',
    type: 'addPage',
    page,
    noteId,
    subjectId,
  }),
  update: (page: Page, noteId: Id, subjectId: Id): PageAction => ({
    category: 'page',
    type: 'updatePage',
    page,
    noteId,
    subjectId,
  }),
  delete: (pageId: Id, noteId: Id, subjectId: Id): PageAction => ({
    category: 'page',
    type: 'deletePage',
    pageId,
    noteId,
    subjectId,
  }),
  reorder: (fromIndex: number, toIndex: number, noteId: Id, subjectId: Id): PageAction => ({
    category: 'page',
    type: 'reorderPages',
    fromIndex,
    toIndex,
    noteId,
    subjectId,
  }),
  select: (pageIndex: number, pageId: Id | null = null): PageAction => ({
    category: 'page',
    type: 'selectPage',
    pageIndex,
    pageId,
  }),
};

/** Template action creators. */
export const templateActions = {
  setNoteTemplate: (template: CanvasTemplate, noteId: Id, subjectId: Id): TemplateAction => ({
    category: 'template',
    type: 'setNoteTemplate',
    template,
    noteId,
    subjectId,
  }),
  setPageTemplate: (template: CanvasTemplate, pageId: Id, noteId: Id, subjectId: Id): TemplateAction => ({
    category: 'template',
    type: 'setPageTemplate',
    template,
    pageId,
    noteId,
    subjectId,
  }),
  setDefaultTemplate: (template: CanvasTemplate): TemplateAction => ({
    category: 'template',
    type: 'setDefaultTemplate',
    template,
  }),
};

/** Navigation action creators. */
export const navigationActions = {
  toSubjectsList: (): NavigationAction => ({ category: 'navigation', type: 'navigateToSubjectsList' }),
  toNote: (noteIndex: number, subjectId: Id): NavigationAction => ({
    category: 'navigation',
    type: 'navigateToNote',
    noteIndex,
    subjectId,
  }),
  setPageNavigatorVisible: (isVisible: boolean): NavigationAction => ({
    category: 'navigation',
    type: 'updatePageNavigatorVisibility',
    isVisible,
  }),
  setSubjectSidebarVisible: (isVisible: boolean): NavigationAction => ({
    category: 'navigation',
    type: 'updateSubjectSidebarVisibility',
    isVisible,
  }),
  setPageSelectionActive: (isActive: boolean): NavigationAction => ({
    category: 'navigation',
    type: 'updatePageSelectionActive',
    isActive,
  }),
  setCoordinateGridVisible: (isVisible: boolean): NavigationAction => ({
    category: 'navigation',
    type: 'updateCoordinateGridVisibility',
    isVisible,
  }),
};

/** Settings action creators. */
export const settingsActions = {
  setFingerDrawingDisabled: (isDisabled: boolean): SettingsAction => ({
    category: 'settings',
    type: 'updateFingerDrawingSetting',
    isDisabled,
  }),
  setAutoScroll: (isEnabled: boolean): SettingsAction => ({
    category: 'settings',
    type: 'updateAutoScrollSetting',
    isEnabled,
  }),
  setDebugMode: (isEnabled: boolean): SettingsAction => ({
    category: 'settings',
    type: 'updateDebugModeSetting',
    isEnabled,
  }),
  setSearchText: (text: string): SettingsAction => ({ category: 'settings', type: 'updateSearchText', text }),
  setDefaultViewMode: (viewMode: ViewMode): SettingsAction => ({
    category: 'settings',
    type: 'updateDefaultViewMode',
    viewMode,
  }),
  setDefaultSort: (sortOption: SortOption, sortOrder: SortOrder): SettingsAction => ({
    category: 'settings',
    type: 'updateDefaultSort',
    sortOption,
    sortOrder,
  }),
};

/** Categories whose actions change persisted content. */
const CONTENT_CATEGORIES: ReadonlySet<ActionCategory> = new Set<ActionCategory>(['subject', 'note', 'page', 'template']);

/** Whether `action` belongs to a category that mutates content. */
export function isContentAction(action: Action): boolean {
  return CONTENT_CATEGORIES.has(action.category);
}

const titleOf = (note: Note): string => (note.title === '' ? 'Untitled' : note.title);
const orNone = (id: Id | null): string => id ?? 'none';

/**
 * Human-readable description of an action, for diagnostics.
 *
 * @example
 * describeAction(subjectActions.add(math)) // "Add subject: Math"
 */
export function describeAction(action: Action): string {
  switch (action.type) {
    case 'addSubject':
      return `Add subject: ${action.subject.name}`;
    case 'updateSubject':
      return `Update subject: ${action.subject.name}`;
    case 'deleteSubject':
      return `Delete subject: ${action.subjectId}`;
    case 'selectSubject':
      return `Select subject: ${orNone(action.subjectId)}`;
    case 'addNote':
      return `Add note: ${titleOf(action.note)} to subject: ${action.subjectId}`;
    case 'updateNote':
      return `Update note: ${titleOf(action.note)} in subject: ${action.subjectId}`;
    case 'deleteNote':
      return `Delete note: ${action.noteId} from subject: ${action.subjectId}`;
    case 'selectNote':
      return `Select note: ${orNone(action.noteId)} in subject: ${orNone(action.subjectId)}`;
    case 'addPage':
      return `Add page to note: ${action.noteId} in subject: ${action.subjectId}`;
    case 'updatePage':
      return `Update page: ${action.page.id} in note: ${action.noteId} in subject: ${action.subjectId}`;
    case 'deletePage':
      return `Delete page: ${action.pageId} from note: ${action.noteId} in subject: ${action.subjectId}`;
    case 'reorderPages':
      return `Reorder pages from index ${action.fromIndex} to ${action.toIndex} in note: ${action.noteId} in subject: ${action.subjectId}`;
    case 'selectPage':
      return `Select page at index: ${action.pageIndex} with ID: ${orNone(action.pageId)}`;
    case 'setNoteTemplate':
      return `Set note template to: ${action.template.type} for note: ${action.noteId} in subject: ${action.subjectId}`;
    case 'setPageTemplate':
      return `Set page template to: ${action.template.type} for page: ${action.pageId} in note: ${action.noteId} in subject: ${action.subjectId}`;
    case 'setDefaultTemplate':
      return `Set default template to: ${action.template.type}`;
    case 'navigateToSubjectsList':
      return 'Navigate to subjects list';
    case 'navigateToNote':
      return `Navigate to note at index: ${action.noteIndex} in subject: ${action.subjectId}`;
    case 'updatePageNavigatorVisibility':
      return `Update page navigator visibility to: ${action.isVisible}`;
    case 'updateSubjectSidebarVisibility':
      return `Update subject sidebar visibility to: ${action.isVisible}`;
    case 'updatePageSelectionActive':
      return `Update page selection active to: ${action.isActive}`;
    case 'updateCoordinateGridVisibility':
      return `Update coordinate grid visibility to: ${action.isVisible}`;
    case 'updateFingerDrawingSetting':
      return `Update finger drawing setting to disabled: ${action.isDisabled}`;
    case 'updateAutoScrollSetting':
      return `Update auto-scroll setting to enabled: ${action.isEnabled}`;
    case 'updateDebugModeSetting':
      return `Update debug mode setting to enabled: ${action.isEnabled}`;
    case 'updateSearchText':
      return `Update search text to: ${action.text}`;
    case 'updateDefaultViewMode':
      return `Update default view mode to: ${action.viewMode}`;
    case 'updateDefaultSort':
      return `Update default sort to: ${action.sortOption} ${action.sortOrder}`;
  }
}
