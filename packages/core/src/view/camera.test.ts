import { describe, it, expect } from 'vitest';
import { parseViewerConfig } from '../config.js';
import {
  cameraEye,
  cameraView,
  createCameraState,
  orbit,
  resetCamera,
  viewMatrix,
  zoom,
} from './camera.js';

const DEG = Math.PI / 180;

describe('orbit camera', () => {
  describe('defaults', () => {
    it('should start at yaw 45°, pitch 30°, distance 3', () => {
      expect(createCameraState()).toEqual({ yaw: 45 * DEG, pitch: 30 * DEG, distance: 3 });
    });

    it('should reset to the exact default triple', () => {
      let state = createCameraState();
      state = orbit(state, 120, -40);
      state = zoom(state, 7);
      expect(resetCamera()).toEqual(createCameraState());
      expect(resetCamera()).not.toEqual(state);
    });

    it('should use configured defaults', () => {
      const { camera } = parseViewerConfig({ camera: { defaultYaw: 0, defaultPitch: 0, defaultDistance: 5 } });
      expect(resetCamera(camera)).toEqual({ yaw: 0, pitch: 0, distance: 5 });
    });
  });

  describe('eye position', () => {
    it('should sit on +Z for yaw 0, pitch 0', () => {
      const eye = cameraEye({ yaw: 0, pitch: 0, distance: 2 });
      expect(eye[0]).toBeCloseTo(0, 12);
      expect(eye[1]).toBeCloseTo(0, 12);
      expect(eye[2]).toBeCloseTo(2, 12);
    });

    it('should sit above the target for positive pitch', () => {
      const eye = cameraEye(createCameraState());
      expect(eye[1]).toBeCloseTo(1.5, 12);
      expect(Math.hypot(...eye)).toBeCloseTo(3, 12);
    });

    it('should derive a right-handed screen basis', () => {
      const view = cameraView({ yaw: 0, pitch: 0, distance: 2 });
      expect(view.target).toEqual([0, 0, 0]);
      expect(view.up).toEqual([0, 1, 0]);
      expect(view.forward[2]).toBeCloseTo(-1, 12);
      expect(view.right[0]).toBeCloseTo(1, 12);
      expect(view.right[1]).toBeCloseTo(0, 12);
      expect(view.right[2]).toBeCloseTo(0, 12);
    });

    it('should place the target on the view -Z axis', () => {
      const state = createCameraState();
      // translation column is the target (origin) in view space
      const m = viewMatrix(state);
      expect(m[12]).toBeCloseTo(0, 10);
      expect(m[13]).toBeCloseTo(0, 10);
      expect(m[14]).toBeCloseTo(-3, 10);
    });
  });

  describe('orbit', () => {
    it('should map drag deltas linearly', () => {
      const start = { yaw: 0, pitch: 0, distance: 3 };
      const next = orbit(start, 10, 20);
      expect(next.yaw).toBeCloseTo(0.1, 12);
      expect(next.pitch).toBeCloseTo(-0.2, 12);
      expect(next.distance).toBe(3);
    });

    it('should not wrap yaw', () => {
      const next = orbit({ yaw: 0, pitch: 0, distance: 3 }, 1000, 0);
      expect(next.yaw).toBeCloseTo(10, 12);
    });

    it('should clamp pitch under any drag magnitude', () => {
      expect(orbit(createCameraState(), 0, -1e9).pitch).toBe(1.5);
      expect(orbit(createCameraState(), 0, 1e9).pitch).toBe(-1.5);

      let state = createCameraState();
      for (let i = 0; i < 500; i++) {
        state = orbit(state, (i % 7) - 3, ((i * 37) % 101) - 30);
        expect(Math.abs(state.pitch)).toBeLessThanOrEqual(1.5);
      }
    });
  });

  describe('zoom', () => {
    it('should move closer for positive wheel deltas', () => {
      expect(zoom({ yaw: 0, pitch: 0, distance: 3 }, 1).distance).toBeCloseTo(2.9, 12);
      expect(zoom({ yaw: 0, pitch: 0, distance: 3 }, -2).distance).toBeCloseTo(3.2, 12);
    });

    it('should clamp to the minimum distance', () => {
      expect(zoom({ yaw: 0, pitch: 0, distance: 3 }, 100).distance).toBe(0.5);
    });
  });
});
