/**
 * Segment Builder
 *
 * Consumes interpreted moves eagerly and produces the frozen segment list,
 * running bounds and summary. Rendering then only reads precomputed data.
 */

import type { Move, Position } from '../gcode/types.js';
import { vec3, type Vec3 } from '../num/vec3.js';
import { boundsSize, expandBounds, type Bounds } from './bounds.js';
import type { LineSegment, Toolpath, ToolpathSummary } from './types.js';

function toVec3(p: Position): Vec3 {
  return vec3(p.x, p.y, p.z);
}

/**
 * Classify and convert one move. Zero-length moves still yield a segment.
 * The segment and both endpoints are frozen.
 */
export function segmentFromMove(move: Move): LineSegment {
  const start = toVec3(move.from);
  const end = toVec3(move.to);
  Object.freeze(start);
  Object.freeze(end);
  const segment: LineSegment = {
    start,
    end,
    kind: move.to.e > move.from.e ? 'extrusion' : 'travel',
    layerZ: end[2],
  };
  return Object.freeze(segment);
}

/**
 * Incremental builder: `add` per move, `finish` once
 */
export class SegmentBuilder {
  private readonly segments: LineSegment[] = [];
  private bounds: Bounds | null = null;
  private readonly zLevels = new Set<number>();
  private extrusionCount = 0;

  add(move: Move): LineSegment {
    const segment = segmentFromMove(move);
    this.push(segment);
    return segment;
  }

  /**
   * Append an already-built segment (used when re-building a trimmed list)
   */
  push(segment: LineSegment): void {
    this.segments.push(segment);
    this.bounds = expandBounds(expandBounds(this.bounds, segment.start), segment.end);
    this.zLevels.add(segment.start[2]);
    this.zLevels.add(segment.end[2]);
    if (segment.kind === 'extrusion') {
      this.extrusionCount += 1;
    }
  }

  get count(): number {
    return this.segments.length;
  }

  finish(): Toolpath {
    const segments = Object.freeze([...this.segments]);
    const zLevels = [...this.zLevels].sort((a, b) => a - b);
    const bounds = this.bounds;

    const summary: ToolpathSummary = {
      segmentCount: segments.length,
      extrusionCount: this.extrusionCount,
      travelCount: segments.length - this.extrusionCount,
      zLevels,
      minZ: bounds ? bounds.min[2] : null,
      maxZ: bounds ? bounds.max[2] : null,
      size: bounds ? boundsSize(bounds) : [0, 0, 0],
    };

    return { segments, bounds, summary };
  }
}

/**
 * Build the complete toolpath from a move sequence
 */
export function buildToolpath(moves: Iterable<Move>): Toolpath {
  const builder = new SegmentBuilder();
  for (const move of moves) {
    builder.add(move);
  }
  return builder.finish();
}

/**
 * Build a toolpath from existing segments (e.g. after trimming)
 */
export function toolpathFromSegments(segments: Iterable<LineSegment>): Toolpath {
  const builder = new SegmentBuilder();
  for (const segment of segments) {
    builder.push(segment);
  }
  return builder.finish();
}
