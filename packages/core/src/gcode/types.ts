/**
 * G-code interpretation types
 */

/**
 * Absolute tool location plus the extrusion accumulator
 */
export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly e: number;
}

export type PositioningMode = 'absolute' | 'relative';

/**
 * How the extrusion axis mode relates to the spatial mode.
 *
 * - `coupled`: G90/G91 govern every axis including E; M82/M83 are ignored.
 * - `independent`: G90/G91 set every axis, then M82/M83 override E only.
 */
export type ExtrusionModeCoupling = 'coupled' | 'independent';

export type MoveCommand = 'G0' | 'G1';

/**
 * One interpreted positioning instruction with resolved absolute endpoints
 */
export interface Move {
  readonly from: Position;
  readonly to: Position;
  /** `to.e > from.e` on resolved absolute values */
  readonly isExtruding: boolean;
  readonly command: MoveCommand;
  /** 1-based source line number */
  readonly line: number;
}

/**
 * A letter-prefixed field of a command line. `value` is NaN when the
 * number after the letter is missing or malformed.
 */
export interface Word {
  readonly letter: string;
  readonly raw: string;
  readonly value: number;
}

/**
 * A line that held a recognized move but could not be applied
 */
export interface SkippedLine {
  readonly line: number;
  readonly text: string;
  readonly reason: string;
}

/**
 * Interpreter state threaded through every step
 */
export interface InterpreterState {
  readonly position: Position;
  readonly mode: PositioningMode;
  readonly extrusionAxisMode: PositioningMode;
}

export interface InterpreterOptions {
  /** Default: `coupled` */
  extrusionMode?: ExtrusionModeCoupling;
  /** Starting position; omitted components are 0 */
  start?: Partial<Position>;
  /** Called for every skipped malformed line */
  onSkip?: (skipped: SkippedLine) => void;
}

/**
 * Totals reported when the interpreter finishes a source
 */
export interface InterpreterStats {
  linesRead: number;
  moves: number;
  skippedLines: number;
}
