/**
 * CameraAdapter - Applies the core orbit camera to a THREE camera
 */

import * as THREE from 'three';
import { cameraView, type CameraState } from '@pathview/core';

/** Vertical field of view in degrees */
export const DEFAULT_FOV = 45;

/**
 * Create a perspective camera for the normalized view volume
 */
export function createPerspectiveCamera(aspect: number, fov = DEFAULT_FOV): THREE.PerspectiveCamera {
  return new THREE.PerspectiveCamera(fov, aspect, 0.01, 100);
}

/**
 * Position and orient `camera` from the orbit state
 */
export function applyCameraState(camera: THREE.Camera, state: CameraState): void {
  const { eye, target, up } = cameraView(state);
  camera.position.set(eye[0], eye[1], eye[2]);
  camera.up.set(up[0], up[1], up[2]);
  camera.lookAt(target[0], target[1], target[2]);
  camera.updateMatrixWorld();
}
