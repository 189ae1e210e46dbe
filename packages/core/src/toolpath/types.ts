/**
 * Toolpath geometry types
 */

import type { Vec3 } from '../num/vec3.js';
import type { Bounds } from './bounds.js';

export type SegmentKind = 'extrusion' | 'travel';

/**
 * One renderable line of the toolpath, in model coordinates
 */
export interface LineSegment {
  readonly start: Vec3;
  readonly end: Vec3;
  readonly kind: SegmentKind;
  /** Model Z of the end point; the layer filter compares against this */
  readonly layerZ: number;
}

/**
 * Reporting figures for a built toolpath
 */
export interface ToolpathSummary {
  segmentCount: number;
  extrusionCount: number;
  travelCount: number;
  /** Distinct endpoint Z values, ascending */
  zLevels: number[];
  /** `null` when there are no segments */
  minZ: number | null;
  maxZ: number | null;
  /** Per-axis extent; zero vector when empty */
  size: Vec3;
}

/**
 * The loaded program's geometry. Built once, never mutated.
 */
export interface Toolpath {
  readonly segments: readonly LineSegment[];
  readonly bounds: Bounds | null;
  readonly summary: ToolpathSummary;
}
