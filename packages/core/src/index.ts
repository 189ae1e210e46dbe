/**
 * @pathview/core - G-code toolpath pipeline
 *
 * ## Pipeline
 * - gcode: tokenizer and stateful interpreter (text -> moves)
 * - toolpath: segment builder, bounds, priming trim (moves -> geometry)
 * - view: render transform, orbit camera, layer filter
 *
 * ## Ambient
 * - config: zod-validated viewer settings
 * - errors: typed fatal errors
 * - log: named loglevel loggers
 */

// =============================================================================
// Numeric
// =============================================================================
export { vec3, type Vec3, add3, sub3, mul3, dot3, cross3, length3, normalize3 } from './num/vec3.js';
export { type Mat4, lookAt4 } from './num/mat4.js';
export { type NumericContext, createNumericContext, clamp } from './num/tolerance.js';

// =============================================================================
// G-code
// =============================================================================
export type {
  Position,
  PositioningMode,
  ExtrusionModeCoupling,
  Move,
  MoveCommand,
  Word,
  SkippedLine,
  InterpreterState,
  InterpreterOptions,
  InterpreterStats,
} from './gcode/types.js';
export { tokenizeLine, stripComments, parseWordValue } from './gcode/tokenize.js';
export {
  ORIGIN,
  createInterpreterState,
  stepLine,
  interpretLines,
  splitLines,
  type StepResult,
} from './gcode/interpreter.js';

// =============================================================================
// Toolpath
// =============================================================================
export type { LineSegment, SegmentKind, Toolpath, ToolpathSummary } from './toolpath/types.js';
export {
  type Bounds,
  pointBounds,
  expandBounds,
  boundsCenter,
  boundsSize,
} from './toolpath/bounds.js';
export { SegmentBuilder, segmentFromMove, buildToolpath, toolpathFromSegments } from './toolpath/builder.js';
export { trimPrimingMoves, type PrimingOptions } from './toolpath/priming.js';

// =============================================================================
// View
// =============================================================================
export { computeRenderTransform, toRenderSpace, type RenderTransform } from './view/normalize.js';
export {
  type CameraState,
  type CameraView,
  createCameraState,
  resetCamera,
  orbit,
  zoom,
  orbitDirection,
  cameraEye,
  cameraView,
  viewMatrix,
} from './view/camera.js';
export {
  type LayerFilterState,
  type ZRange,
  type DisplayState,
  DEFAULT_DISPLAY,
  createLayerFilter,
  toggleLayerFilter,
  stepLayerThreshold,
  setLayerThreshold,
  isSegmentVisible,
  isSegmentDrawn,
  visibleSegments,
} from './view/layerFilter.js';

// =============================================================================
// Loading, reporting, config
// =============================================================================
export { loadToolpathFromString, type LoadOptions, type LoadResult } from './load.js';
export { formatSummary, formatBounds } from './report.js';
export {
  viewerConfigSchema,
  parseViewerConfig,
  DEFAULT_VIEWER_CONFIG,
  type ViewerConfig,
  type CameraConfig,
  type LayerConfig,
  type NormalizeConfig,
  type GcodeConfig,
} from './config.js';
export { PathviewError, InputReadError, ConfigError } from './errors.js';
export { getLogger, setLogLevel, type Logger, type LogLevelName } from './log.js';
