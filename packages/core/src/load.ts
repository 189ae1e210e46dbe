/**
 * Program loading
 *
 * Runs program text through the interpreter and builder, and optionally
 * trims priming moves. Malformed lines are skipped by the interpreter.
 * File access lives in `node.ts` so this module stays browser-safe.
 */

import { DEFAULT_VIEWER_CONFIG, type GcodeConfig } from './config.js';
import { interpretLines, splitLines } from './gcode/interpreter.js';
import type { InterpreterStats, SkippedLine } from './gcode/types.js';
import { getLogger } from './log.js';
import { SegmentBuilder, toolpathFromSegments } from './toolpath/builder.js';
import { trimPrimingMoves } from './toolpath/priming.js';
import type { Toolpath } from './toolpath/types.js';

const logger = getLogger('load');

export interface LoadOptions {
  gcode?: Partial<GcodeConfig>;
  onSkip?: (skipped: SkippedLine) => void;
}

export interface LoadResult {
  toolpath: Toolpath;
  stats: InterpreterStats;
  /** Segment count before priming trim (equals the move count) */
  parsedSegments: number;
}

/**
 * Build a toolpath from program text
 */
export function loadToolpathFromString(source: string, options: LoadOptions = {}): LoadResult {
  const gcode = { ...DEFAULT_VIEWER_CONFIG.gcode, ...options.gcode };
  const moves = interpretLines(splitLines(source), {
    extrusionMode: gcode.extrusionMode,
    onSkip: options.onSkip,
  });

  const builder = new SegmentBuilder();
  let next = moves.next();
  while (!next.done) {
    builder.add(next.value);
    next = moves.next();
  }
  const stats = next.value;

  let toolpath = builder.finish();
  const parsedSegments = toolpath.summary.segmentCount;
  logger.info(`Parsed ${parsedSegments} line segments`);

  if (gcode.trimPriming) {
    toolpath = toolpathFromSegments(trimPrimingMoves(toolpath.segments));
    logger.info(`After filtering priming: ${toolpath.summary.segmentCount} segments`);
  }

  return { toolpath, stats, parsedSegments };
}
