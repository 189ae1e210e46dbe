/**
 * 4x4 matrix operations
 *
 * Matrices are represented as 16-element arrays in column-major order:
 * [m00, m10, m20, m30, m01, m11, m21, m31, m02, m12, m22, m32, m03, m13, m23, m33]
 *
 * This matches common graphics library conventions (WebGL, three.js).
 * All operations are pure functions.
 */

import { cross3, dot3, normalize3, sub3, type Vec3 } from './vec3.js';

export type Mat4 = [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
];

/**
 * Right-handed look-at view matrix (world -> camera).
 *
 * The camera looks down its local -Z axis, matching three.js and WebGL.
 */
export function lookAt4(eye: Vec3, target: Vec3, up: Vec3): Mat4 {
  const zAxis = normalize3(sub3(eye, target));
  const xAxis = normalize3(cross3(up, zAxis));
  const yAxis = cross3(zAxis, xAxis);

  return [
    xAxis[0], yAxis[0], zAxis[0], 0,
    xAxis[1], yAxis[1], zAxis[1], 0,
    xAxis[2], yAxis[2], zAxis[2], 0,
    -dot3(xAxis, eye), -dot3(yAxis, eye), -dot3(zAxis, eye), 1,
  ];
}
