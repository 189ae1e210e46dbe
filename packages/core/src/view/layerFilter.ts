/**
 * Layer Filter
 *
 * "Peel down to this layer": when enabled, only segments whose layer Z is at
 * or below the threshold are drawn. Filtering never edits the segment list.
 */

import { DEFAULT_VIEWER_CONFIG, type LayerConfig } from '../config.js';
import { clamp } from '../num/tolerance.js';
import type { LineSegment } from '../toolpath/types.js';

export interface LayerFilterState {
  readonly enabled: boolean;
  /** Model-space Z; always within [minZ, maxZ] */
  readonly threshold: number;
  readonly minZ: number;
  readonly maxZ: number;
  readonly step: number;
}

export interface ZRange {
  minZ: number | null;
  maxZ: number | null;
}

/**
 * Disabled filter showing everything (threshold at the top of the model)
 */
export function createLayerFilter(
  range: ZRange,
  config: LayerConfig = DEFAULT_VIEWER_CONFIG.layers
): LayerFilterState {
  const minZ = range.minZ ?? 0;
  const maxZ = range.maxZ ?? minZ;
  return { enabled: false, threshold: maxZ, minZ, maxZ, step: config.step };
}

export function toggleLayerFilter(state: LayerFilterState): LayerFilterState {
  return { ...state, enabled: !state.enabled };
}

/**
 * Move the threshold by one step up (+1) or down (-1). Ignored while the
 * filter is disabled.
 */
export function stepLayerThreshold(state: LayerFilterState, direction: 1 | -1): LayerFilterState {
  if (!state.enabled) {
    return state;
  }
  return setLayerThreshold(state, state.threshold + direction * state.step);
}

/**
 * Set the threshold directly, clamped to the model's Z range
 */
export function setLayerThreshold(state: LayerFilterState, z: number): LayerFilterState {
  return { ...state, threshold: clamp(z, state.minZ, state.maxZ) };
}

export function isSegmentVisible(segment: LineSegment, state: LayerFilterState): boolean {
  return !state.enabled || segment.layerZ <= state.threshold;
}

// ============================================================================
// Display toggles
// ============================================================================

export interface DisplayState {
  readonly showTravel: boolean;
  readonly showAxes: boolean;
}

export const DEFAULT_DISPLAY: DisplayState = { showTravel: true, showAxes: true };

/**
 * Layer filter plus the travel toggle
 */
export function isSegmentDrawn(
  segment: LineSegment,
  filter: LayerFilterState,
  display: DisplayState = DEFAULT_DISPLAY
): boolean {
  if (segment.kind === 'travel' && !display.showTravel) {
    return false;
  }
  return isSegmentVisible(segment, filter);
}

export function visibleSegments(
  segments: readonly LineSegment[],
  filter: LayerFilterState,
  display: DisplayState = DEFAULT_DISPLAY
): LineSegment[] {
  return segments.filter((segment) => isSegmentDrawn(segment, filter, display));
}
