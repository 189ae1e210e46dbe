/**
 * ToolpathAdapter - Converts a pathview Toolpath to THREE.LineSegments
 *
 * Segments are already classified and bounded by the core; this adapter only
 * maps them into render space, shades them and packs them into buffers.
 */

import * as THREE from 'three';
import {
  boundsSize,
  normalize3,
  sub3,
  dot3,
  toRenderSpace,
  type Bounds,
  type LineSegment,
  type RenderTransform,
  type Vec3,
} from '@pathview/core';

export type Rgba = [number, number, number, number];

/** Light from top-front-right, render space */
export const LIGHT_DIRECTION: Vec3 = normalize3([0.5, 0.7, 0.3]);

const EXTRUSION_RGB: Vec3 = [100, 200, 255];
const TRAVEL_RGB: Vec3 = [255, 100, 100];
const TRAVEL_ALPHA = 180 / 255;

/**
 * Position of a layer between the lowest and highest Z (0 = bottom, 1 = top).
 * Flat models report 0.
 */
export function heightRatio(layerZ: number, bounds: Bounds | null): number {
  if (!bounds) {
    return 0;
  }
  const range = bounds.max[2] - bounds.min[2];
  if (range <= 0) {
    return 0;
  }
  return Math.min(1, Math.max(0, (layerZ - bounds.min[2]) / range));
}

/**
 * Ambient 0.6 plus up to 0.4 of diffuse light; both line directions are lit
 */
export function lineLighting(start: Vec3, end: Vec3, light: Vec3 = LIGHT_DIRECTION): number {
  const direction = normalize3(sub3(end, start));
  return 0.6 + Math.abs(dot3(direction, light)) * 0.4;
}

/**
 * Colour for one segment: blue extrusion brightening with height, dimmer
 * translucent red travel. Channels are 0..1.
 */
export function segmentColor(
  segment: LineSegment,
  bounds: Bounds | null,
  transform: RenderTransform
): Rgba {
  const h = heightRatio(segment.layerZ, bounds);
  const lighting = lineLighting(toRenderSpace(segment.start, transform), toRenderSpace(segment.end, transform));

  if (segment.kind === 'extrusion') {
    const brightness = (0.5 + h * 0.5) * lighting;
    return [...scaleRgb(EXTRUSION_RGB, brightness), 1];
  }
  const brightness = (0.6 + h * 0.4) * lighting;
  return [...scaleRgb(TRAVEL_RGB, brightness), TRAVEL_ALPHA];
}

function scaleRgb(rgb: Vec3, brightness: number): Vec3 {
  return [
    Math.min(1, (rgb[0] * brightness) / 255),
    Math.min(1, (rgb[1] * brightness) / 255),
    Math.min(1, (rgb[2] * brightness) / 255),
  ];
}

/**
 * Pack segments into a BufferGeometry with `position` (xyz) and `color`
 * (rgba) attributes, two vertices per segment.
 */
export function toolpathToBufferGeometry(
  segments: readonly LineSegment[],
  bounds: Bounds | null,
  transform: RenderTransform
): THREE.BufferGeometry {
  const positions = new Float32Array(segments.length * 6);
  const colors = new Float32Array(segments.length * 8);

  segments.forEach((segment, i) => {
    positions.set(toRenderSpace(segment.start, transform), i * 6);
    positions.set(toRenderSpace(segment.end, transform), i * 6 + 3);
    const color = segmentColor(segment, bounds, transform);
    colors.set(color, i * 8);
    colors.set(color, i * 8 + 4);
  });

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));
  geometry.setAttribute('color', new THREE.BufferAttribute(colors, 4));
  if (segments.length > 0) {
    geometry.computeBoundingSphere();
  }
  return geometry;
}

/**
 * Create the line object for a set of (already filtered) segments
 */
export function createToolpathLines(
  segments: readonly LineSegment[],
  bounds: Bounds | null,
  transform: RenderTransform,
  material?: THREE.Material
): THREE.LineSegments {
  const defaultMaterial = material ?? new THREE.LineBasicMaterial({
    vertexColors: true,
    transparent: true,
  });
  return new THREE.LineSegments(toolpathToBufferGeometry(segments, bounds, transform), defaultMaterial);
}

/**
 * Replace the geometry of existing lines, e.g. after the layer filter moves
 */
export function updateToolpathLines(
  lines: THREE.LineSegments,
  segments: readonly LineSegment[],
  bounds: Bounds | null,
  transform: RenderTransform
): void {
  lines.geometry.dispose();
  lines.geometry = toolpathToBufferGeometry(segments, bounds, transform);
}

/**
 * Release GPU resources of lines built by `createToolpathLines`
 */
export function disposeToolpathLines(lines: THREE.LineSegments): void {
  lines.geometry.dispose();
  disposeMaterial(lines.material);
}

function disposeMaterial(material: THREE.Material | THREE.Material[]): void {
  if (Array.isArray(material)) {
    material.forEach((m) => m.dispose());
  } else {
    material.dispose();
  }
}

// ============================================================================
// Axis indicator
// ============================================================================

/**
 * Tick spacing in model units for a model of the given largest dimension
 */
export function tickInterval(maxDimension: number): number {
  if (maxDimension > 200) {
    return 50;
  }
  if (maxDimension > 100) {
    return 20;
  }
  return 10;
}

/**
 * Tick offsets along an axis of the given length, excluding 0
 */
export function tickOffsets(length: number, interval: number): number[] {
  const ticks: number[] = [];
  for (let t = interval; t <= length; t += interval) {
    ticks.push(t);
  }
  return ticks;
}

const AXIS_COLORS = {
  x: 0xff5050,
  vertical: 0x50ff50,
  depth: 0x5050ff,
} as const;

const TICK_SIZE = 0.05;

/**
 * Axis lines from the model's min corner, each as long as the model along
 * that axis, with tick marks every `tickInterval` model units.
 */
export function createAxisIndicator(bounds: Bounds, transform: RenderTransform): THREE.Group {
  const group = new THREE.Group();
  const origin = toRenderSpace(bounds.min, transform);
  const [sizeX, sizeY, sizeZ] = boundsSize(bounds);
  const interval = tickInterval(Math.max(sizeX, sizeY, sizeZ));
  const { scale } = transform;

  // Render axes: model X -> x, model Z -> up (y), model Y -> depth (z)
  const axes: { length: number; dir: Vec3; tick: Vec3; color: number }[] = [
    { length: sizeX, dir: [1, 0, 0], tick: [0, TICK_SIZE, 0], color: AXIS_COLORS.x },
    { length: sizeZ, dir: [0, 1, 0], tick: [TICK_SIZE, 0, 0], color: AXIS_COLORS.vertical },
    { length: sizeY, dir: [0, 0, 1], tick: [0, TICK_SIZE, 0], color: AXIS_COLORS.depth },
  ];

  for (const axis of axes) {
    const points: number[] = [...origin, ...along(origin, axis.dir, axis.length * scale)];
    for (const t of tickOffsets(axis.length, interval)) {
      const p = along(origin, axis.dir, t * scale);
      points.push(...p, p[0] + axis.tick[0], p[1] + axis.tick[1], p[2] + axis.tick[2]);
    }
    const geometry = new THREE.BufferGeometry();
    geometry.setAttribute('position', new THREE.Float32BufferAttribute(points, 3));
    group.add(new THREE.LineSegments(geometry, new THREE.LineBasicMaterial({ color: axis.color })));
  }

  return group;
}

function along(origin: Vec3, dir: Vec3, distance: number): Vec3 {
  return [origin[0] + dir[0] * distance, origin[1] + dir[1] * distance, origin[2] + dir[2] * distance];
}

/**
 * Release every axis line created by `createAxisIndicator`
 */
export function disposeAxisIndicator(group: THREE.Group): void {
  group.traverse((child) => {
    if (child instanceof THREE.LineSegments) {
      disposeToolpathLines(child);
    }
  });
}
