/**
 * @module subscription-manager
 * Owns the subscription handles of one observer (typically a UI component)
 * and cancels them together when that observer goes away.
 */

import type { EventBus, EventCallback, EventName, SubscriptionHandle } from '@notecore/types';

/**
 * Container of subscriptions scoped to an owner's lifetime.
 *
 * The owner must call {@link SubscriptionManager.clearAll} exactly once at
 * teardown; until then every retained callback keeps firing.
 */
export class SubscriptionManager {
  private handles = new Set<SubscriptionHandle>();

  constructor(private readonly bus: EventBus) {}

  /** Number of retained, still-live subscriptions. */
  get size(): number {
    let live = 0;
    for (const handle of this.handles) {
      if (!handle.cancelled) live++;
    }
    return live;
  }

  /** Subscribe on the bus and retain the handle. */
  subscribe<K extends EventName>(event: K, callback: EventCallback<K>): void {
    this.store(this.bus.subscribe(event, callback));
  }

  /** Adopt a handle created elsewhere so it is cancelled with the rest. */
  store(handle: SubscriptionHandle): void {
    this.handles.add(handle);
  }

  /** Cancel every retained handle, then forget them. */
  clearAll(): void {
    for (const handle of this.handles) {
      handle.cancel();
    }
    this.handles.clear();
  }
}
