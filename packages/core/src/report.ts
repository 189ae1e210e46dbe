/**
 * Status text for the viewer overlay and CLI
 */

import type { Vec3 } from './num/vec3.js';
import type { Bounds } from './toolpath/bounds.js';
import type { Toolpath } from './toolpath/types.js';

function fmt(v: Vec3, sep: string): string {
  return v.map((n) => n.toFixed(1)).join(sep);
}

/**
 * e.g. `Segments: 2 | Layers: 1 | Size: 10.0x0.0x0.0mm`
 */
export function formatSummary(toolpath: Toolpath): string {
  const { summary } = toolpath;
  return `Segments: ${summary.segmentCount} | Layers: ${summary.zLevels.length} | Size: ${fmt(summary.size, 'x')}mm`;
}

/**
 * e.g. `Bounds: (0.0, 0.0, 0.0) to (10.0, 5.0, 0.2)`
 */
export function formatBounds(bounds: Bounds | null): string {
  if (!bounds) {
    return 'Bounds: empty';
  }
  return `Bounds: (${fmt(bounds.min, ', ')}) to (${fmt(bounds.max, ', ')})`;
}
