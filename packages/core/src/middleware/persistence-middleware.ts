/**
 * @module middleware/persistence-middleware
 * Debounced saving of content to the persistence collaborator.
 *
 * Content actions that change state schedule a save. At most one save runs
 * at a time; a request that arrives during a save is remembered and
 * scheduled again, with the full debounce, once the running save settles.
 */

import type { Action, AppState, EventBus, Middleware, PersistenceAdapter } from '@notecore/types';
import { isContentAction } from '../actions';
import type { Logger } from '../logger';

/** Options for {@link PersistenceMiddleware}. */
export interface PersistenceMiddlewareOptions {
  adapter: PersistenceAdapter;
  bus: EventBus;
  logger: Logger;
  /** Returns the state to save; normally `store.getState`. */
  getState: () => AppState;
  /** Delay between the last content change and the save. */
  debounceMs?: number;
}

export class PersistenceMiddleware implements Middleware {
  readonly name = 'persistence';

  private timer: ReturnType<typeof setTimeout> | null = null;
  private saving = false;
  private pending = false;
  private idleWaiters: (() => void)[] = [];
  private readonly adapter: PersistenceAdapter;
  private readonly bus: EventBus;
  private readonly logger: Logger;
  private readonly getState: () => AppState;
  private readonly debounceMs: number;

  constructor(options: PersistenceMiddlewareOptions) {
    this.adapter = options.adapter;
    this.bus = options.bus;
    this.logger = options.logger;
    this.getState = options.getState;
    this.debounceMs = options.debounceMs ?? 3000;
  }

  /** Whether a save is currently running. */
  get isSaving(): boolean {
    return this.saving;
  }

  /** Whether a save is waiting on the timer or on a running save. */
  get hasPendingSave(): boolean {
    return this.timer !== null || this.pending;
  }

  afterReduce(action: Action, previous: AppState, next: AppState): void {
    if (!isContentAction(action) || next.content === previous.content) return;
    this.schedule();
  }

  /**
   * Save now, cancelling any scheduled save. Waits for a running save first.
   * Intended for lifecycle events such as shutdown.
   */
  async flush(): Promise<void> {
    while (this.saving) {
      await this.whenIdle();
    }
    this.cancelTimer();
    this.pending = false;
    await this.save();
  }

  /** Cancel a scheduled save. A running save is left to finish. */
  dispose(): void {
    this.cancelTimer();
    this.pending = false;
  }

  private whenIdle(): Promise<void> {
    if (!this.saving) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private schedule(): void {
    if (this.saving) {
      this.pending = true;
      return;
    }
    this.cancelTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.save();
    }, this.debounceMs);
  }

  private cancelTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Runs one save, then reschedules if a change came in meanwhile. Never rejects. */
  private async save(): Promise<void> {
    this.saving = true;
    try {
      await this.saveOnce();
    } catch (error) {
      // A persistence event subscriber threw.
      this.logger.error({ err: error }, 'Persistence listener failed');
    } finally {
      this.saving = false;
      if (this.pending) {
        this.pending = false;
        this.schedule();
      }
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async saveOnce(): Promise<void> {
    const subjects = this.getState().content.subjects;
    let reason: string | null = null;
    try {
      if (await this.adapter.save(subjects)) {
        this.logger.debug({ subjectCount: subjects.length }, 'Content saved');
      } else {
        reason = 'adapter reported failure';
      }
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
    }

    if (reason === null) {
      this.bus.publish('persistence:saved', { subjectCount: subjects.length });
    } else {
      this.logger.error({ reason }, 'Failed to save content');
      this.bus.publish('persistence:failed', { reason });
    }
  }
}
