/**
 * @module templates
 * Predefined canvas background templates.
 */

import type { CanvasTemplate } from '@notecore/types';

const DEFAULT_COLOR = '#CCCCCC';

/** Built-in templates keyed by pattern kind. */
export const TEMPLATE_PRESETS = {
  none: { type: 'none', spacing: 24, colorHex: DEFAULT_COLOR, lineWidth: 0.5 },
  lined: { type: 'lined', spacing: 24, colorHex: DEFAULT_COLOR, lineWidth: 0.5 },
  graph: { type: 'graph', spacing: 20, colorHex: DEFAULT_COLOR, lineWidth: 0.5 },
  dotted: { type: 'dotted', spacing: 20, colorHex: DEFAULT_COLOR, lineWidth: 0.5 },
} as const satisfies Record<CanvasTemplate['type'], CanvasTemplate>;

/** Display names shown in template pickers. */
export const TEMPLATE_LABELS: Record<CanvasTemplate['type'], string> = {
  none: 'None',
  lined: 'Lined Paper',
  graph: 'Graph Paper',
  dotted: 'Dotted Paper',
};
