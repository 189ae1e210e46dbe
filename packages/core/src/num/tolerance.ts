/**
 * Tolerance model for toolpath normalization
 *
 * Spans and distances below the length tolerance are treated as the
 * tolerance itself so that scale factors never divide by zero.
 */

/**
 * Tolerance values for a loaded program
 */
export interface Tolerances {
  /** Smallest span (model units) used when fitting geometry to the view */
  length: number;
}

/**
 * Numeric context containing tolerance information
 */
export interface NumericContext {
  tol: Tolerances;
}

/**
 * Default tolerances (suitable for programs in mm)
 */
export const DEFAULT_TOLERANCES: Tolerances = {
  length: 1e-6,
};

/**
 * Create a default numeric context
 */
export function createNumericContext(tol?: Partial<Tolerances>): NumericContext {
  return {
    tol: {
      length: tol?.length ?? DEFAULT_TOLERANCES.length,
    },
  };
}

/**
 * Raise a non-negative span to at least the length tolerance. Non-finite
 * spans also fall back to the tolerance.
 */
export function guardSpan(span: number, ctx: NumericContext): number {
  if (!Number.isFinite(span) || span < ctx.tol.length) {
    return ctx.tol.length;
  }
  return span;
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
