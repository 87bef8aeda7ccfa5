/**
 * @module runtime
 * Composition root: builds a bus and a store hydrated from persistence, then
 * wires middleware, action events, event commands and the legacy bridge.
 */

import type { Clock, EventBus, LegacyNotificationCenter, PersistenceAdapter } from '@notecore/types';
import { attachActionEvents } from './action-events';
import { loadConfig, type NotecoreConfig } from './config';
import { bindEventCommands } from './event-commands';
import { EventBusImpl } from './event-bus';
import { LegacyNotificationBridge } from './legacy-bridge';
import { componentLogger, createLogger, type Logger } from './logger';
import { createLoggingMiddleware } from './middleware/logging-middleware';
import { PersistenceMiddleware } from './middleware/persistence-middleware';
import { createStoreFromPersistence, type Store } from './store';

/** Options for {@link createNotecoreRuntime}. */
export interface NotecoreRuntimeOptions {
  persistence: PersistenceAdapter;
  /** Legacy channel to bridge; no bridge is started without one. */
  legacyCenter?: LegacyNotificationCenter;
  /** Defaults to {@link loadConfig} over `process.env`. */
  config?: NotecoreConfig;
  /** Defaults to a logger built from `config`. */
  logger?: Logger;
  clock?: Clock;
}

export interface NotecoreRuntime {
  readonly config: NotecoreConfig;
  readonly logger: Logger;
  readonly bus: EventBus;
  readonly store: Store;
  readonly persistence: PersistenceMiddleware;
  readonly bridge: LegacyNotificationBridge | null;
  /** Save pending content, then detach everything. Safe to call twice. */
  dispose(): Promise<void>;
}

/**
 * Assemble a running state core.
 *
 * @throws ConfigError when no config is given and the environment is invalid.
 */
export async function createNotecoreRuntime(options: NotecoreRuntimeOptions): Promise<NotecoreRuntime> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config);
  const storeLogger = componentLogger(logger, 'store');
  const bus = new EventBusImpl();

  const store = await createStoreFromPersistence(options.persistence, {
    bus,
    logger: storeLogger,
    debug: config.debug,
    clock: options.clock,
  });

  const persistence = new PersistenceMiddleware({
    adapter: options.persistence,
    bus,
    logger: componentLogger(logger, 'persistence'),
    getState: () => store.getState(),
    debounceMs: config.saveDebounceMs,
  });
  store.registerMiddleware(createLoggingMiddleware(storeLogger, config.debug));
  store.registerMiddleware(persistence);

  const actionEvents = attachActionEvents(bus);
  const commands = bindEventCommands(bus, store);

  const bridge = options.legacyCenter
    ? new LegacyNotificationBridge({ bus, center: options.legacyCenter, logger: componentLogger(logger, 'bridge') })
    : null;
  bridge?.start();

  const runtimeLogger = componentLogger(logger, 'runtime');
  runtimeLogger.info(
    { subjectCount: store.getState().content.subjects.length, bridged: bridge !== null },
    'Runtime started',
  );

  let disposed = false;
  return {
    config,
    logger,
    bus,
    store,
    persistence,
    bridge,
    async dispose() {
      if (disposed) return;
      disposed = true;
      bridge?.stop();
      commands.clearAll();
      actionEvents.cancel();
      if (persistence.hasPendingSave || persistence.isSaving) {
        await persistence.flush();
      }
      persistence.dispose();
      runtimeLogger.info('Runtime disposed');
    },
  };
}
