/**
 * @module errors
 * Error types raised by the state core.
 *
 * Reducers never throw; these cover programmer errors and bad configuration.
 */

/** Machine-readable error codes. */
export type NotecoreErrorCode = 'REENTRANT_DISPATCH' | 'INVALID_CONFIG';

/** Base class of every error the core throws. */
export class NotecoreError extends Error {
  constructor(
    readonly code: NotecoreErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'NotecoreError';
  }
}

/** Thrown in debug mode when `dispatch` is called from inside a dispatch. */
export class ReentrantDispatchError extends NotecoreError {
  constructor(readonly description: string) {
    super('REENTRANT_DISPATCH', `Reentrant dispatch rejected: ${description}`);
    this.name = 'ReentrantDispatchError';
  }
}

/** Thrown when environment configuration fails validation. */
export class ConfigError extends NotecoreError {
  constructor(readonly keys: readonly string[], detail: string) {
    super('INVALID_CONFIG', `Invalid configuration (${keys.join(', ')}): ${detail}`);
    this.name = 'ConfigError';
  }
}
