/**
 * @module entities
 * Domain entities: subjects own ordered notes, notes own ordered pages.
 *
 * Entities are plain immutable values. Two entities are the same entity when
 * their `id`s match; structural equality is never used for identity.
 */

import type { Id, Timestamp } from './common';

/** Background pattern kind drawn behind the ink layer. */
export type TemplateType = 'none' | 'lined' | 'graph' | 'dotted';

/** Background template settings for a note or a single page. */
export interface CanvasTemplate {
  /** Pattern kind. */
  readonly type: TemplateType;
  /** Distance between lines or dots, in points. */
  readonly spacing: number;
  /** Pattern color as `#RRGGBB`. */
  readonly colorHex: string;
  /** Stroke width of lines, in points. */
  readonly lineWidth: number;
}

/** A single drawable page of a note. */
export interface Page {
  /** Unique identifier (UUID v4). */
  readonly id: Id;
  /** Serialized ink drawing. Empty when nothing has been drawn. */
  readonly drawingData: Uint8Array;
  /** Page-specific template, or null to inherit the note template. */
  readonly template: CanvasTemplate | null;
  /** 1-based position within the owning note. */
  readonly pageNumber: number;
  /** Whether the user bookmarked this page. */
  readonly isBookmarked: boolean;
}

/** A note: an ordered sequence of pages. */
export interface Note {
  /** Unique identifier (UUID v4). */
  readonly id: Id;
  /** Title, may be empty. */
  readonly title: string;
  /** Legacy single-canvas drawing, kept for notes created before pages existed. */
  readonly drawingData: Uint8Array;
  readonly dateCreated: Timestamp;
  readonly lastModified: Timestamp;
  /** Pages in display order. */
  readonly pages: readonly Page[];
  /** Template applied to pages that do not override it. */
  readonly noteTemplate: CanvasTemplate | null;
}

/** A subject (notebook) grouping notes. */
export interface Subject {
  /** Unique identifier (UUID v4). */
  readonly id: Id;
  /** Display name, e.g. "Math". */
  readonly name: string;
  /** Color name used for the subject badge (red, orange, blue, ...). */
  readonly colorName: string;
  /** Notes in display order. */
  readonly notes: readonly Note[];
  /** Updated on every mutation of the subject or anything it owns. */
  readonly lastModified: Timestamp;
}
