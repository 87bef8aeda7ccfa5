/**
 * @module event-bus
 * Type-safe pub/sub event bus for cross-module communication.
 *
 * Delivery is synchronous: every subscriber runs inline before `publish`
 * returns. A publish issued from inside a callback runs to completion
 * (depth-first) before the outer publish continues.
 *
 * @see {@link @notecore/types#EventBus} for the interface contract
 * @see {@link @notecore/types#EventMap} for the event catalogue
 */

import type {
  EventBus,
  EventCallback,
  EventMap,
  EventName,
  SubscriptionHandle,
} from '@notecore/types';

/** Generic callback type used internally by the event bus. */
type Callback = (payload: unknown) => void;

/**
 * One registration on the bus. Doubles as the caller's cancellation handle.
 *
 * The `active` flag is checked on delivery, so a subscription cancelled while
 * a publish is iterating its snapshot is never invoked again.
 */
class Subscription<K extends EventName = EventName> implements SubscriptionHandle<K> {
  private active = true;

  constructor(
    readonly id: number,
    readonly eventType: K,
    private readonly callback: Callback,
    private readonly detach: (subscription: Subscription) => void,
  ) {}

  get cancelled(): boolean {
    return !this.active;
  }

  cancel(): void {
    if (!this.active) return;
    this.active = false;
    this.detach(this);
  }

  /** Invoke the callback unless the subscription has been cancelled. */
  deliver(payload: unknown): void {
    if (this.active) {
      this.callback(payload);
    }
  }

  /** Mark cancelled without detaching; used when the bus drops everything at once. */
  invalidate(): void {
    this.active = false;
  }
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Stores subscriptions in a `Map<EventName, Subscription[]>` so that iteration
 * order matches registration order. Publishing iterates over a snapshot so
 * that subscriptions added or removed during delivery don't disturb it.
 */
export class EventBusImpl implements EventBus {
  /** Registered subscriptions keyed by event name. */
  private listeners = new Map<EventName, Subscription[]>();

  private nextId = 1;

  /** @inheritdoc */
  publish<K extends EventName>(event: K, payload: EventMap[K]): void {
    const list = this.listeners.get(event);
    if (!list) return;

    for (const subscription of [...list]) {
      subscription.deliver(payload);
    }
  }

  /** @inheritdoc */
  subscribe<K extends EventName>(event: K, callback: EventCallback<K>): SubscriptionHandle<K> {
    return this.register(event, callback as Callback);
  }

  /** @inheritdoc */
  once<K extends EventName>(event: K, callback: EventCallback<K>): SubscriptionHandle<K> {
    const subscription = this.register(event, (payload) => {
      subscription.cancel();
      (callback as Callback)(payload);
    });
    return subscription;
  }

  /** @inheritdoc */
  unsubscribe(handle: SubscriptionHandle): void {
    handle.cancel();
  }

  /** @inheritdoc */
  listActiveEventTypes(): ReadonlySet<EventName> {
    return new Set(this.listeners.keys());
  }

  /** @inheritdoc */
  subscriptionCount(event: EventName): number {
    return this.listeners.get(event)?.length ?? 0;
  }

  /** @inheritdoc */
  clearAllSubscriptions(): void {
    for (const list of this.listeners.values()) {
      for (const subscription of list) subscription.invalidate();
    }
    this.listeners.clear();
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private register<K extends EventName>(event: K, callback: Callback): Subscription<K> {
    const subscription = new Subscription(this.nextId++, event, callback, (s) => this.detach(s));
    const list = this.listeners.get(event);
    if (list) {
      list.push(subscription);
    } else {
      this.listeners.set(event, [subscription]);
    }
    return subscription;
  }

  /** Remove a subscription, deleting the list when it becomes empty to avoid leaks. */
  private detach(subscription: Subscription): void {
    const list = this.listeners.get(subscription.eventType);
    if (!list) return;

    const index = list.indexOf(subscription);
    if (index !== -1) list.splice(index, 1);
    if (list.length === 0) {
      this.listeners.delete(subscription.eventType);
    }
  }
}
