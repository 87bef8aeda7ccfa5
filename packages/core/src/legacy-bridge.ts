/**
 * @module legacy-bridge
 * Two-way bridge between the typed event bus and the legacy notification
 * channel, so modules that still post and observe legacy names keep working.
 *
 * Outbound, a typed event is posted under its legacy name with the payload's
 * fields as a flat record. Inbound, a legacy post is validated and
 * republished as the typed event; posts that fail validation are dropped.
 *
 * The bridge remembers the payload objects it forwards. When one of them
 * comes back from the other side it is ignored, so nothing echoes, while a
 * new event of the same name raised during delivery still crosses.
 */

import { z } from 'zod';
import type {
  CanvasTemplate,
  EmptyPayload,
  EventBus,
  EventMap,
  LegacyNotificationCenter,
  LegacyPayload,
} from '@notecore/types';
import type { Logger } from './logger';
import { SubscriptionManager } from './subscription-manager';

/** Events that cross the bridge. */
export const BRIDGED_EVENTS = [
  'page:selected',
  'page:selected-by-user',
  'page:selection-deactivated',
  'page:added',
  'page:reordering',
  'page:visible-changed',
  'page:scroll-to',
  'drawing:page-changed',
  'drawing:live-update',
  'drawing:started',
  'drawing:completed',
  'template:refresh',
  'template:force-refresh',
  'template:changed',
  'ui:sidebar-visibility-changed',
  'ui:close-sidebar',
  'ui:toggle-sidebar',
  'grid:state-changed',
  'grid:toggle',
  'system:debug-mode-changed',
  'system:auto-scroll-changed',
  'system:coordinator-ready',
] as const;

export type BridgedEventName = (typeof BRIDGED_EVENTS)[number];

const LEGACY_NAMES: { readonly [K in BridgedEventName]: string } = {
  'page:selected': 'PageSelected',
  'page:selected-by-user': 'PageSelectedByUser',
  'page:selection-deactivated': 'PageSelectionDeactivated',
  'page:added': 'PageAdded',
  'page:reordering': 'PageReordering',
  'page:visible-changed': 'VisiblePageChanged',
  'page:scroll-to': 'ScrollToPage',
  'drawing:page-changed': 'PageDrawingChanged',
  'drawing:live-update': 'LiveDrawingUpdate',
  'drawing:started': 'DrawingStarted',
  'drawing:completed': 'DrawingDidComplete',
  'template:refresh': 'RefreshTemplate',
  'template:force-refresh': 'ForceTemplateRefresh',
  'template:changed': 'TemplateChanged',
  'ui:sidebar-visibility-changed': 'SidebarVisibilityChanged',
  'ui:close-sidebar': 'CloseSidebar',
  'ui:toggle-sidebar': 'ToggleSidebar',
  'grid:state-changed': 'GridStateChanged',
  'grid:toggle': 'ToggleCoordinateGrid',
  'system:debug-mode-changed': 'DebugModeChanged',
  'system:auto-scroll-changed': 'AutoScrollSettingChanged',
  'system:coordinator-ready': 'CoordinatorReady',
};

// ── payload schemas ──────────────────────────────────────────────────

type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const empty: PayloadSchema<EmptyPayload> = z.object({}).transform((): EmptyPayload => ({}));
const pageIndex = z.object({ pageIndex: z.number().int().nonnegative() });
const pageId = z.object({ pageId: z.string().min(1) });
const isVisible = z.object({ isVisible: z.boolean() });
const isEnabled = z.object({ isEnabled: z.boolean() });

const templateSchema: PayloadSchema<CanvasTemplate> = z.object({
  type: z.enum(['none', 'lined', 'graph', 'dotted']),
  spacing: z.number().positive(),
  colorHex: z.string().regex(/^#[0-9A-Fa-f]{6}$/),
  lineWidth: z.number().positive(),
});

const SCHEMAS: { readonly [K in BridgedEventName]: PayloadSchema<EventMap[K]> } = {
  'page:selected': pageIndex,
  'page:selected-by-user': pageIndex,
  'page:selection-deactivated': empty,
  'page:added': pageId,
  'page:reordering': z.object({
    fromIndex: z.number().int().nonnegative(),
    toIndex: z.number().int().nonnegative(),
  }),
  'page:visible-changed': pageIndex,
  'page:scroll-to': pageIndex,
  'drawing:page-changed': pageId.extend({ drawingData: z.instanceof(Uint8Array).optional() }),
  'drawing:live-update': pageId,
  'drawing:started': pageId,
  'drawing:completed': pageId,
  'template:refresh': empty,
  'template:force-refresh': empty,
  'template:changed': z.object({ template: templateSchema }),
  'ui:sidebar-visibility-changed': isVisible,
  'ui:close-sidebar': empty,
  'ui:toggle-sidebar': empty,
  'grid:state-changed': isVisible,
  'grid:toggle': empty,
  'system:debug-mode-changed': isEnabled,
  'system:auto-scroll-changed': isEnabled,
  'system:coordinator-ready': z.object({
    coordinator: z.object({ kind: z.literal('opaque-handle'), id: z.string().min(1) }),
  }),
};

// ── bridge ───────────────────────────────────────────────────────────

/** Options for {@link LegacyNotificationBridge}. */
export interface LegacyBridgeOptions {
  bus: EventBus;
  center: LegacyNotificationCenter;
  logger: Logger;
}

export class LegacyNotificationBridge {
  private readonly bus: EventBus;
  private readonly center: LegacyNotificationCenter;
  private readonly logger: Logger;
  private readonly subscriptions: SubscriptionManager;
  private removeObservers: (() => void)[] = [];
  /** Typed payloads republished from legacy posts. */
  private fromLegacy = new WeakSet<object>();
  /** Records posted to the legacy channel. */
  private toLegacy = new WeakSet<object>();
  private running = false;

  constructor(options: LegacyBridgeOptions) {
    this.bus = options.bus;
    this.center = options.center;
    this.logger = options.logger;
    this.subscriptions = new SubscriptionManager(options.bus);
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Begin forwarding in both directions. Calling it again is a no-op. */
  start(): void {
    if (this.running) return;
    this.running = true;
    for (const event of BRIDGED_EVENTS) {
      this.connect(event);
    }
    this.logger.debug({ events: BRIDGED_EVENTS.length }, 'Legacy bridge started');
  }

  /** Remove every subscription and observer the bridge holds. */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.subscriptions.clearAll();
    for (const remove of this.removeObservers) remove();
    this.removeObservers = [];
    this.fromLegacy = new WeakSet();
    this.toLegacy = new WeakSet();
    this.logger.debug('Legacy bridge stopped');
  }

  private connect<K extends BridgedEventName>(event: K): void {
    const legacyName = LEGACY_NAMES[event];
    const schema: PayloadSchema<EventMap[K]> = SCHEMAS[event];

    this.subscriptions.subscribe(event, (payload) => {
      if (this.fromLegacy.has(payload)) return;
      const record: LegacyPayload = { ...payload };
      this.toLegacy.add(record);
      this.center.post(legacyName, record);
    });

    this.removeObservers.push(
      this.center.addObserver(legacyName, (raw: LegacyPayload) => {
        if (this.toLegacy.has(raw)) return;
        const result = schema.safeParse(raw);
        if (!result.success) {
          this.logger.warn(
            { event, issues: result.error.issues.map((issue) => issue.message) },
            'Dropped invalid legacy notification',
          );
          return;
        }
        const payload = result.data;
        this.fromLegacy.add(payload);
        this.bus.publish(event, payload);
      }),
    );
  }
}
