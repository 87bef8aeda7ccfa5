/**
 * @module entity-factory
 * Factory functions for creating subjects, notes and pages.
 * Each function produces a properly initialized entity with default values.
 */

import type { CanvasTemplate, Id, Note, Page, Subject, Timestamp } from '@notecore/types';

/** New random identifier (UUID v4). */
export function generateId(): Id {
  return crypto.randomUUID();
}

/** Options for creating a page. */
export interface CreatePageOptions {
  id?: Id;
  template?: CanvasTemplate | null;
  pageNumber?: number;
  drawingData?: Uint8Array;
  isBookmarked?: boolean;
}

/**
 * Creates a new empty page.
 *
 * @param options - Optional overrides; the page number defaults to 1.
 */
export function createPage(options: CreatePageOptions = {}): Page {
  return {
    id: options.id ?? generateId(),
    drawingData: options.drawingData ?? new Uint8Array(0),
    template: options.template ?? null,
    pageNumber: options.pageNumber ?? 1,
    isBookmarked: options.isBookmarked ?? false,
  };
}

/** Options for creating a note. */
export interface CreateNoteOptions {
  id?: Id;
  pages?: readonly Page[];
  noteTemplate?: CanvasTemplate | null;
  now?: Timestamp;
}

/**
 * Creates a new note.
 *
 * @param title   - Title, may be empty.
 * @param options - Optional pages, template and creation time.
 */
export function createNote(title: string, options: CreateNoteOptions = {}): Note {
  const now = options.now ?? Date.now();
  return {
    id: options.id ?? generateId(),
    title,
    drawingData: new Uint8Array(0),
    dateCreated: now,
    lastModified: now,
    pages: options.pages ?? [],
    noteTemplate: options.noteTemplate ?? null,
  };
}

/** Options for creating a subject. */
export interface CreateSubjectOptions {
  id?: Id;
  colorName?: string;
  notes?: readonly Note[];
  now?: Timestamp;
}

/**
 * Creates a new subject.
 *
 * @param name    - Display name, e.g. "History".
 * @param options - Optional color (defaults to gray), notes and timestamp.
 */
export function createSubject(name: string, options: CreateSubjectOptions = {}): Subject {
  return {
    id: options.id ?? generateId(),
    name,
    colorName: options.colorName ?? 'gray',
    notes: options.notes ?? [],
    lastModified: options.now ?? Date.now(),
  };
}

/** Identity comparison for entities: same `id`, regardless of content. */
export function sameEntity(a: { readonly id: Id }, b: { readonly id: Id }): boolean {
  return a.id === b.id;
}
