/**
 * 3D vector operations
 *
 * Vectors are represented as tuples [number, number, number] for simplicity and performance.
 * All operations are pure functions.
 */

export type Vec3 = [number, number, number];

/**
 * Create a 3D vector
 */
export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

/**
 * Zero vector
 */
export const ZERO3: Vec3 = [0, 0, 0];

/**
 * Render-space up axis
 */
export const Y_AXIS: Vec3 = [0, 1, 0];

/**
 * Add two vectors: a + b
 */
export function add3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

/**
 * Subtract two vectors: a - b
 */
export function sub3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/**
 * Multiply vector by scalar: v * s
 */
export function mul3(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

/**
 * Dot product: a · b
 */
export function dot3(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

/**
 * Cross product: a × b
 */
export function cross3(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/**
 * Length of vector
 */
export function length3(v: Vec3): number {
  return Math.sqrt(dot3(v, v));
}

/**
 * Normalize vector to unit length
 * Returns zero vector if input is zero
 */
export function normalize3(v: Vec3): Vec3 {
  const len = length3(v);
  if (len === 0) {
    return [0, 0, 0];
  }
  return [v[0] / len, v[1] / len, v[2] / len];
}

/**
 * Component-wise minimum
 */
export function min3(a: Vec3, b: Vec3): Vec3 {
  return [Math.min(a[0], b[0]), Math.min(a[1], b[1]), Math.min(a[2], b[2])];
}

/**
 * Component-wise maximum
 */
export function max3(a: Vec3, b: Vec3): Vec3 {
  return [Math.max(a[0], b[0]), Math.max(a[1], b[1]), Math.max(a[2], b[2])];
}
