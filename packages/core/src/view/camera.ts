/**
 * Orbit Camera
 *
 * Yaw/pitch/distance around a fixed target at the origin (the model is
 * pre-centred by `computeRenderTransform`). Render space is Y-up.
 *
 * Sign convention: positive pitch puts the eye above the target, looking
 * down. Dragging the pointer down (positive dy) lowers the eye.
 *
 * Every function is pure; the view is recomputed on each query.
 */

import { DEFAULT_VIEWER_CONFIG, type CameraConfig } from '../config.js';
import { lookAt4, type Mat4 } from '../num/mat4.js';
import { clamp } from '../num/tolerance.js';
import { add3, cross3, mul3, normalize3, sub3, Y_AXIS, ZERO3, type Vec3 } from '../num/vec3.js';

export interface CameraState {
  /** Radians around the up axis; continuous, never wrapped */
  readonly yaw: number;
  /** Radians above the horizontal plane through the target */
  readonly pitch: number;
  /** Eye-to-target distance in render units */
  readonly distance: number;
}

export interface CameraView {
  eye: Vec3;
  target: Vec3;
  up: Vec3;
  /** Unit vector from eye to target */
  forward: Vec3;
  /** Unit vector to the screen's right */
  right: Vec3;
}

/**
 * Default camera state, also used by reset
 */
export function createCameraState(config: CameraConfig = DEFAULT_VIEWER_CONFIG.camera): CameraState {
  return {
    yaw: config.defaultYaw,
    pitch: clamp(config.defaultPitch, -config.pitchLimit, config.pitchLimit),
    distance: Math.max(config.defaultDistance, config.minDistance),
  };
}

/**
 * Return the exact default triple as a single new state
 */
export function resetCamera(config: CameraConfig = DEFAULT_VIEWER_CONFIG.camera): CameraState {
  return createCameraState(config);
}

/**
 * Apply a pointer drag delta (screen pixels)
 */
export function orbit(
  state: CameraState,
  dx: number,
  dy: number,
  config: CameraConfig = DEFAULT_VIEWER_CONFIG.camera
): CameraState {
  return {
    ...state,
    yaw: state.yaw + dx * config.sensitivity,
    pitch: clamp(state.pitch - dy * config.sensitivity, -config.pitchLimit, config.pitchLimit),
  };
}

/**
 * Apply a wheel delta; positive values move the eye closer
 */
export function zoom(
  state: CameraState,
  wheelDelta: number,
  config: CameraConfig = DEFAULT_VIEWER_CONFIG.camera
): CameraState {
  return {
    ...state,
    distance: Math.max(config.minDistance, state.distance - wheelDelta * config.zoomStep),
  };
}

/**
 * Unit direction from target to eye
 */
export function orbitDirection(yaw: number, pitch: number): Vec3 {
  const cosPitch = Math.cos(pitch);
  return [cosPitch * Math.sin(yaw), Math.sin(pitch), cosPitch * Math.cos(yaw)];
}

/**
 * Eye position in render space
 */
export function cameraEye(state: CameraState): Vec3 {
  return add3(ZERO3, mul3(orbitDirection(state.yaw, state.pitch), state.distance));
}

/**
 * Eye, target, up and the derived screen basis
 */
export function cameraView(state: CameraState): CameraView {
  const eye = cameraEye(state);
  const target: Vec3 = [0, 0, 0];
  const up: Vec3 = [Y_AXIS[0], Y_AXIS[1], Y_AXIS[2]];
  const forward = normalize3(sub3(target, eye));
  const right = normalize3(cross3(forward, up));
  return { eye, target, up, forward, right };
}

/**
 * World -> camera matrix for renderers that take one
 */
export function viewMatrix(state: CameraState): Mat4 {
  const { eye, target, up } = cameraView(state);
  return lookAt4(eye, target, up);
}
