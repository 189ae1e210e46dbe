/**
 * Bounds/Scale Calculator
 *
 * Fits the toolpath into a cube of edge `targetExtent` centred on the origin
 * with one uniform scale, so aspect ratio is preserved on every axis.
 */

import { DEFAULT_VIEWER_CONFIG, type NormalizeConfig } from '../config.js';
import { createNumericContext, guardSpan } from '../num/tolerance.js';
import type { Vec3 } from '../num/vec3.js';
import { boundsCenter, boundsSize, type Bounds } from '../toolpath/bounds.js';

export interface RenderTransform {
  /** Model-space point moved to the origin */
  readonly center: Vec3;
  /** Uniform model -> render scale; always positive and finite */
  readonly scale: number;
}

/**
 * Compute the centre offset and uniform scale for a set of bounds.
 *
 * Spans below `epsilon` count as `epsilon`, so a single point or a flat
 * model still gets a finite scale. `null` bounds (no geometry) are treated
 * as a single point at the origin.
 */
export function computeRenderTransform(
  bounds: Bounds | null,
  options: NormalizeConfig = DEFAULT_VIEWER_CONFIG.normalize
): RenderTransform {
  const ctx = createNumericContext({ length: options.epsilon });
  if (!bounds) {
    return { center: [0, 0, 0], scale: options.targetExtent / guardSpan(0, ctx) };
  }

  const [sx, sy, sz] = boundsSize(bounds);
  const span = Math.max(guardSpan(sx, ctx), guardSpan(sy, ctx), guardSpan(sz, ctx));
  return { center: boundsCenter(bounds), scale: options.targetExtent / span };
}

/**
 * Map a model point into render space.
 *
 * Recentres, scales, then swaps Y and Z: model Z (layer height) becomes
 * render +Y, the renderer's up axis.
 */
export function toRenderSpace(p: Vec3, transform: RenderTransform): Vec3 {
  const { center, scale } = transform;
  return [
    (p[0] - center[0]) * scale,
    (p[2] - center[2]) * scale,
    (p[1] - center[1]) * scale,
  ];
}
