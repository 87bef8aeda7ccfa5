/**
 * @module common
 * Common primitive types used across all packages.
 */

/** Stable unique identifier of a subject, note or page (UUID v4). */
export type Id = string;

/** Milliseconds since the Unix epoch. */
export type Timestamp = number;

/**
 * Reference to a value owned outside the state core.
 * Issued by a handle registry; the core never looks inside the referenced value.
 */
export interface OpaqueHandle {
  /** Discriminator so handles survive a trip through untyped payloads. */
  readonly kind: 'opaque-handle';
  /** Registry-issued identifier. */
  readonly id: string;
}

/** Payload of events that carry no data. */
export type EmptyPayload = Readonly<Record<string, never>>;

/** Source of the current time, injectable for deterministic reduction. */
export interface Clock {
  /** Current time in epoch milliseconds. */
  now(): Timestamp;
}
