/**
 * Axis-aligned bounds over segment endpoints
 */

import { max3, min3, sub3, type Vec3 } from '../num/vec3.js';

export interface Bounds {
  readonly min: Vec3;
  readonly max: Vec3;
}

/**
 * Bounds of a single point (min == max)
 */
export function pointBounds(p: Vec3): Bounds {
  return { min: [p[0], p[1], p[2]], max: [p[0], p[1], p[2]] };
}

/**
 * Grow bounds to include a point. `null` means no point seen yet.
 */
export function expandBounds(bounds: Bounds | null, p: Vec3): Bounds {
  if (!bounds) {
    return pointBounds(p);
  }
  return { min: min3(bounds.min, p), max: max3(bounds.max, p) };
}

/**
 * Per-axis midpoint
 */
export function boundsCenter(bounds: Bounds): Vec3 {
  return [
    (bounds.min[0] + bounds.max[0]) * 0.5,
    (bounds.min[1] + bounds.max[1]) * 0.5,
    (bounds.min[2] + bounds.max[2]) * 0.5,
  ];
}

/**
 * Per-axis extent (max - min)
 */
export function boundsSize(bounds: Bounds): Vec3 {
  return sub3(bounds.max, bounds.min);
}
