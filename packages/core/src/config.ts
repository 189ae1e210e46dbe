/**
 * Viewer configuration
 *
 * Zod schema for the tunables of the camera, layer filter, normalization and
 * G-code interpretation. Every field has a default, so `{}` is a valid config.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const DEG = Math.PI / 180;

// ============================================================================
// Section Schemas
// ============================================================================

export const cameraConfigSchema = z.object({
  /** Initial and reset yaw (radians) */
  defaultYaw: z.number().default(45 * DEG),
  /** Initial and reset pitch (radians, positive = above the target) */
  defaultPitch: z.number().default(30 * DEG),
  /** Initial and reset distance from the target (render units) */
  defaultDistance: z.number().positive().default(3),
  /** Radians of rotation per pointer pixel */
  sensitivity: z.number().positive().default(0.01),
  /** Distance change per wheel unit */
  zoomStep: z.number().positive().default(0.1),
  /** Closest the eye may get to the target */
  minDistance: z.number().positive().default(0.5),
  /** Pitch is clamped to [-pitchLimit, pitchLimit] */
  pitchLimit: z
    .number()
    .positive()
    .lt(Math.PI / 2, 'Pitch limit must stay below 90 degrees')
    .default(1.5),
});

export const layerConfigSchema = z.object({
  /** Threshold change per up/down event (model units) */
  step: z.number().positive().default(0.5),
});

export const normalizeConfigSchema = z.object({
  /** Edge length of the cube the model is fitted into */
  targetExtent: z.number().positive().default(2),
  /** Smallest span used when computing the scale */
  epsilon: z.number().positive().default(1e-6),
});

export const gcodeConfigSchema = z.object({
  /** Whether M82/M83 may set the extrusion axis mode apart from G90/G91 */
  extrusionMode: z.enum(['coupled', 'independent']).default('coupled'),
  /** Drop leading priming and homing moves after parsing */
  trimPriming: z.boolean().default(false),
});

// ============================================================================
// Viewer Config
// ============================================================================

export const viewerConfigSchema = z.object({
  camera: cameraConfigSchema.default(cameraConfigSchema.parse({})),
  layers: layerConfigSchema.default(layerConfigSchema.parse({})),
  normalize: normalizeConfigSchema.default(normalizeConfigSchema.parse({})),
  gcode: gcodeConfigSchema.default(gcodeConfigSchema.parse({})),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export type CameraConfig = z.infer<typeof cameraConfigSchema>;
export type LayerConfig = z.infer<typeof layerConfigSchema>;
export type NormalizeConfig = z.infer<typeof normalizeConfigSchema>;
export type GcodeConfig = z.infer<typeof gcodeConfigSchema>;
export type ViewerConfig = z.infer<typeof viewerConfigSchema>;

/**
 * Validate raw configuration, filling in defaults
 */
export function parseViewerConfig(input: unknown): ViewerConfig {
  const result = viewerConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid viewer configuration', issues);
  }
  return result.data;
}

export const DEFAULT_VIEWER_CONFIG: ViewerConfig = parseViewerConfig({});
