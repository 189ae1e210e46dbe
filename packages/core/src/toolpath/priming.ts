/**
 * Priming trim
 *
 * Slicers start a print with homing, a purge line along the bed edge and long
 * positioning moves. This drops everything before the first cluster of
 * extrusion away from the bed edges, and everything after the last extrusion.
 */

import type { LineSegment } from './types.js';

export interface PrimingOptions {
  /** Segments examined together when looking for the print start */
  window?: number;
  /** Extrusions required inside the window */
  minExtrusions?: number;
  /** Segments with any X below this are at the bed edge */
  edgeX?: number;
  /** Segments with any Y below this are at the bed edge */
  edgeY?: number;
  /** Segments moving further than this on X or Y are positioning moves */
  maxMove?: number;
}

const DEFAULTS: Required<PrimingOptions> = {
  window: 5,
  minExtrusions: 3,
  edgeX: 10,
  edgeY: 20,
  maxMove: 100,
};

function isInterior(segment: LineSegment, opts: Required<PrimingOptions>): boolean {
  const { start, end } = segment;
  const atEdge = start[0] < opts.edgeX || end[0] < opts.edgeX || start[1] < opts.edgeY || end[1] < opts.edgeY;
  const longMove = Math.abs(end[0] - start[0]) > opts.maxMove || Math.abs(end[1] - start[1]) > opts.maxMove;
  return !atEdge && !longMove;
}

/**
 * Return the slice of segments that makes up the actual print
 */
export function trimPrimingMoves(
  segments: readonly LineSegment[],
  options: PrimingOptions = {}
): LineSegment[] {
  const opts = { ...DEFAULTS, ...options };

  let start = 0;
  for (let i = 0; i + opts.window <= segments.length; i++) {
    const window = segments.slice(i, i + opts.window);
    const extrusions = window.filter((s) => s.kind === 'extrusion').length;
    if (extrusions >= opts.minExtrusions && window.every((s) => isInterior(s, opts))) {
      start = i;
      break;
    }
  }

  let end = segments.length;
  for (let i = segments.length - 1; i >= 0; i--) {
    if (segments[i].kind === 'extrusion') {
      end = i + 1;
      break;
    }
  }

  return segments.slice(start, Math.max(start, end));
}
