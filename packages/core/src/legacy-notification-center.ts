/**
 * @module legacy-notification-center
 * In-process implementation of the legacy string-keyed broadcast channel.
 */

import type { LegacyNotificationCenter, LegacyObserver, LegacyPayload } from '@notecore/types';

export class InMemoryNotificationCenter implements LegacyNotificationCenter {
  private observers = new Map<string, LegacyObserver[]>();

  post(name: string, payload: LegacyPayload): void {
    const list = this.observers.get(name);
    if (!list) return;
    for (const observer of [...list]) {
      observer(payload);
    }
  }

  addObserver(name: string, observer: LegacyObserver): () => void {
    // Wrap so the same function can be registered twice and removed once.
    const entry: LegacyObserver = (payload) => observer(payload);
    const list = this.observers.get(name);
    if (list) {
      list.push(entry);
    } else {
      this.observers.set(name, [entry]);
    }

    return () => {
      const current = this.observers.get(name);
      if (!current) return;
      const index = current.indexOf(entry);
      if (index !== -1) current.splice(index, 1);
      if (current.length === 0) this.observers.delete(name);
    };
  }

  /** Number of observers registered for `name`. */
  observerCount(name: string): number {
    return this.observers.get(name)?.length ?? 0;
  }
}
