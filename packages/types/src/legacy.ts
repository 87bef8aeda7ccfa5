/**
 * @module legacy
 * The string-keyed broadcast mechanism that predates the typed event bus.
 * Only the legacy bridge talks to it.
 */

/** Untyped payload of a legacy broadcast: the event's fields, flattened. */
export type LegacyPayload = Readonly<Record<string, unknown>>;

/** Callback registered with the legacy notification center. */
export type LegacyObserver = (payload: LegacyPayload) => void;

/** Legacy broadcast primitive. */
export interface LegacyNotificationCenter {
  /** Broadcast `payload` to every observer of `name`. Observers receive the object itself, not a copy. */
  post(name: string, payload: LegacyPayload): void;
  /** Observe a name. Returns a function that removes the observer. */
  addObserver(name: string, observer: LegacyObserver): () => void;
}
