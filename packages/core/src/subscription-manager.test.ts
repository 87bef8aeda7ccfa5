import { describe, expect, it, vi } from 'vitest';
import { EventBusImpl } from './event-bus';
import { SubscriptionManager } from './subscription-manager';

describe('SubscriptionManager', () => {
  it('delegates subscriptions to the bus', () => {
    const bus = new EventBusImpl();
    const manager = new SubscriptionManager(bus);
    const cb = vi.fn();

    manager.subscribe('page:visible-changed', cb);
    bus.publish('page:visible-changed', { pageIndex: 3 });

    expect(cb).toHaveBeenCalledWith({ pageIndex: 3 });
    expect(manager.size).toBe(1);
  });

  it('invokes zero callbacks after clearAll()', () => {
    const bus = new EventBusImpl();
    const manager = new SubscriptionManager(bus);
    const selected = vi.fn();
    const started = vi.fn();

    manager.subscribe('page:selected', selected);
    manager.subscribe('drawing:started', started);
    manager.clearAll();

    bus.publish('page:selected', { pageIndex: 0 });
    bus.publish('drawing:started', { pageId: 'p' });

    expect(selected).not.toHaveBeenCalled();
    expect(started).not.toHaveBeenCalled();
    expect(manager.size).toBe(0);
    expect(bus.listActiveEventTypes().size).toBe(0);
  });

  it('leaves subscriptions owned by other managers alone', () => {
    const bus = new EventBusImpl();
    const leaving = new SubscriptionManager(bus);
    const staying = new SubscriptionManager(bus);
    const stayingCb = vi.fn();

    leaving.subscribe('grid:toggle', vi.fn());
    staying.subscribe('grid:toggle', stayingCb);
    leaving.clearAll();
    bus.publish('grid:toggle', {});

    expect(stayingCb).toHaveBeenCalledOnce();
  });

  it('cancels adopted handles together with its own', () => {
    const bus = new EventBusImpl();
    const manager = new SubscriptionManager(bus);
    const handle = bus.subscribe('template:refresh', vi.fn());

    manager.store(handle);
    manager.clearAll();

    expect(handle.cancelled).toBe(true);
  });

  it('tolerates handles that were already cancelled', () => {
    const bus = new EventBusImpl();
    const manager = new SubscriptionManager(bus);
    const handle = bus.subscribe('template:refresh', vi.fn());
    manager.store(handle);
    handle.cancel();

    expect(manager.size).toBe(0);
    expect(() => manager.clearAll()).not.toThrow();
  });

  it('can be reused after clearAll()', () => {
    const bus = new EventBusImpl();
    const manager = new SubscriptionManager(bus);
    const cb = vi.fn();

    manager.subscribe('grid:toggle', vi.fn());
    manager.clearAll();
    manager.subscribe('grid:toggle', cb);
    bus.publish('grid:toggle', {});

    expect(cb).toHaveBeenCalledOnce();
  });
});
