/**
 * @module in-memory-persistence
 * A {@link PersistenceAdapter} that keeps subjects in memory. Used for
 * previews, tooling and tests.
 */

import type { PersistenceAdapter, Subject } from '@notecore/types';

export class InMemoryPersistence implements PersistenceAdapter {
  /** Every batch handed to `save`, oldest first. */
  readonly saves: (readonly Subject[])[] = [];

  private stored: readonly Subject[];
  private outcome: 'ok' | 'fail' | Error = 'ok';

  constructor(initial: readonly Subject[] = []) {
    this.stored = initial;
  }

  /** Subjects as of the last successful save. */
  get subjects(): readonly Subject[] {
    return this.stored;
  }

  /**
   * Make subsequent saves resolve to false (`'fail'`), reject with an
   * error, or succeed again (`'ok'`).
   */
  setOutcome(outcome: 'ok' | 'fail' | Error): void {
    this.outcome = outcome;
  }

  async load(): Promise<readonly Subject[]> {
    return this.stored;
  }

  async save(subjects: readonly Subject[]): Promise<boolean> {
    this.saves.push(subjects);
    if (this.outcome instanceof Error) throw this.outcome;
    if (this.outcome === 'fail') return false;
    this.stored = subjects;
    return true;
  }
}
