/**
 * G-code Interpreter
 *
 * Folds command lines into `Move` values. The interpreter state (position and
 * positioning modes) is an explicit value passed through `stepLine`, so any
 * single line can be interpreted in isolation from a known state.
 */

import { getLogger } from '../log.js';
import { tokenizeLine } from './tokenize.js';
import type {
  ExtrusionModeCoupling,
  InterpreterOptions,
  InterpreterState,
  InterpreterStats,
  Move,
  MoveCommand,
  Position,
  PositioningMode,
  SkippedLine,
  Word,
} from './types.js';

const logger = getLogger('gcode');

// ============================================================================
// State
// ============================================================================

export const ORIGIN: Position = { x: 0, y: 0, z: 0, e: 0 };

/**
 * Initial state: origin (or `start`), absolute mode on every axis
 */
export function createInterpreterState(start?: Partial<Position>): InterpreterState {
  return {
    position: { ...ORIGIN, ...start },
    mode: 'absolute',
    extrusionAxisMode: 'absolute',
  };
}

/**
 * Result of interpreting one line
 */
export interface StepResult {
  state: InterpreterState;
  moves: Move[];
  /** Set when the line held a recognized move that could not be applied */
  skipped?: SkippedLine;
}

// ============================================================================
// Commands
// ============================================================================

interface Command {
  letter: 'G' | 'M';
  word: Word;
  params: Word[];
}

/**
 * Group words into commands: each G/M word opens a command and the
 * following words are its parameters. Words before the first command
 * (T, F, bare axis words) have no command to belong to and are dropped.
 */
function groupCommands(words: Word[]): Command[] {
  const commands: Command[] = [];
  let current: Command | undefined;
  for (const word of words) {
    if (word.letter === 'G' || word.letter === 'M') {
      current = { letter: word.letter, word, params: [] };
      commands.push(current);
    } else if (current) {
      current.params.push(word);
    }
  }
  return commands;
}

function moveCommandOf(command: Command): MoveCommand | undefined {
  if (command.letter !== 'G') {
    return undefined;
  }
  if (command.word.value === 0) {
    return 'G0';
  }
  if (command.word.value === 1) {
    return 'G1';
  }
  return undefined;
}

function resolveAxis(current: number, value: number | undefined, mode: PositioningMode): number {
  if (value === undefined) {
    return current;
  }
  return mode === 'relative' ? current + value : value;
}

function paramValue(params: Word[], letter: string): number | undefined {
  let value: number | undefined;
  for (const param of params) {
    if (param.letter === letter) {
      value = param.value;
    }
  }
  return value;
}

/**
 * Apply a G0/G1 command's axis words to a position
 */
export function applyMove(state: InterpreterState, params: Word[]): Position {
  const { position, mode, extrusionAxisMode } = state;
  return {
    x: resolveAxis(position.x, paramValue(params, 'X'), mode),
    y: resolveAxis(position.y, paramValue(params, 'Y'), mode),
    z: resolveAxis(position.z, paramValue(params, 'Z'), mode),
    e: resolveAxis(position.e, paramValue(params, 'E'), extrusionAxisMode),
  };
}

function applyModeCommand(
  state: InterpreterState,
  command: Command,
  coupling: ExtrusionModeCoupling
): InterpreterState {
  const code = command.word.value;
  if (command.letter === 'G' && (code === 90 || code === 91)) {
    const mode: PositioningMode = code === 90 ? 'absolute' : 'relative';
    return { ...state, mode, extrusionAxisMode: mode };
  }
  if (command.letter === 'M' && coupling === 'independent' && (code === 82 || code === 83)) {
    return { ...state, extrusionAxisMode: code === 82 ? 'absolute' : 'relative' };
  }
  return state;
}

const AXES = ['x', 'y', 'z', 'e'] as const;

function findOverflow(position: Position): string | undefined {
  return AXES.find((axis) => !Number.isFinite(position[axis]));
}

function findMalformed(commands: Command[]): string | undefined {
  for (const command of commands) {
    const move = moveCommandOf(command);
    if (!move) {
      continue;
    }
    const bad = command.params.find((param) => Number.isNaN(param.value));
    if (bad) {
      return `malformed ${bad.letter} value "${bad.raw}" on ${move}`;
    }
  }
  return undefined;
}

// ============================================================================
// Interpretation
// ============================================================================

/**
 * Interpret one source line from `state`.
 *
 * A line with a malformed field on a G0/G1, or one whose relative moves run
 * past the range of a double, is skipped whole: the returned state is the
 * input state and no moves are produced.
 */
export function stepLine(
  state: InterpreterState,
  text: string,
  lineNumber: number,
  coupling: ExtrusionModeCoupling = 'coupled'
): StepResult {
  const commands = groupCommands(tokenizeLine(text));
  if (commands.length === 0) {
    return { state, moves: [] };
  }

  const reason = findMalformed(commands);
  if (reason) {
    return { state, moves: [], skipped: { line: lineNumber, text, reason } };
  }

  let next = state;
  const moves: Move[] = [];
  for (const command of commands) {
    const moveCommand = moveCommandOf(command);
    if (!moveCommand) {
      next = applyModeCommand(next, command, coupling);
      continue;
    }

    const from = next.position;
    const to = applyMove(next, command.params);
    const overflow = findOverflow(to);
    if (overflow) {
      const reason = `${overflow.toUpperCase()} position out of range on ${moveCommand}`;
      return { state, moves: [], skipped: { line: lineNumber, text, reason } };
    }
    moves.push({
      from,
      to,
      isExtruding: to.e > from.e,
      command: moveCommand,
      line: lineNumber,
    });
    next = { ...next, position: to };
  }

  return { state: next, moves };
}

/**
 * Lazily interpret a sequence of lines into moves.
 *
 * The generator's return value carries totals for the whole source.
 */
export function* interpretLines(
  lines: Iterable<string>,
  options: InterpreterOptions = {}
): Generator<Move, InterpreterStats, undefined> {
  const coupling = options.extrusionMode ?? 'coupled';
  const stats: InterpreterStats = { linesRead: 0, moves: 0, skippedLines: 0 };
  let state = createInterpreterState(options.start);

  for (const text of lines) {
    stats.linesRead += 1;
    const result = stepLine(state, text, stats.linesRead, coupling);
    state = result.state;

    if (result.skipped) {
      stats.skippedLines += 1;
      logger.warn(`Skipping line ${result.skipped.line} (${result.skipped.reason}): ${text.trim()}`);
      options.onSkip?.(result.skipped);
    }

    for (const move of result.moves) {
      stats.moves += 1;
      yield move;
    }
  }

  return stats;
}

/**
 * Split program text into lines
 */
export function splitLines(source: string): string[] {
  return source.split(/\r?\n/);
}
