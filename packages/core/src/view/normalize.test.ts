import { describe, it, expect } from 'vitest';
import { computeRenderTransform, toRenderSpace, type RenderTransform } from './normalize.js';

describe('render transform', () => {
  it('should centre on the bounds midpoint and scale by the largest span', () => {
    const t = computeRenderTransform({ min: [0, 0, 0], max: [10, 5, 2] });
    expect(t.center).toEqual([5, 2.5, 1]);
    expect(t.scale).toBeCloseTo(0.2, 12);
  });

  it('should preserve aspect ratio across axes', () => {
    const t = computeRenderTransform({ min: [0, 0, 0], max: [10, 5, 2] });
    const corner = toRenderSpace([10, 5, 2], t);
    expect(corner[0]).toBeCloseTo(1, 12);
    expect(corner[1]).toBeCloseTo(0.2, 12);
    expect(corner[2]).toBeCloseTo(0.5, 12);
  });

  it('should map model Z to render up', () => {
    const t: RenderTransform = { center: [0, 0, 0], scale: 1 };
    expect(toRenderSpace([1, 2, 3], t)).toEqual([1, 3, 2]);
  });

  it('should give a finite positive scale for a single point', () => {
    const t = computeRenderTransform({ min: [4, 4, 4], max: [4, 4, 4] });
    expect(t.center).toEqual([4, 4, 4]);
    expect(t.scale).toBe(2 / 1e-6);
    expect(Number.isFinite(t.scale)).toBe(true);
  });

  it('should give a finite positive scale for unbounded spans', () => {
    const t = computeRenderTransform({ min: [0, 0, 0], max: [Number.POSITIVE_INFINITY, 0, 0] });
    expect(t.scale).toBe(2 / 1e-6);
  });

  it('should give a finite positive scale for flat models', () => {
    const t = computeRenderTransform({ min: [0, 0, 0.2], max: [20, 10, 0.2] });
    expect(t.scale).toBeCloseTo(0.1, 12);
  });

  it('should handle missing bounds', () => {
    const t = computeRenderTransform(null);
    expect(t.center).toEqual([0, 0, 0]);
    expect(t.scale).toBeGreaterThan(0);
    expect(Number.isFinite(t.scale)).toBe(true);
  });

  it('should honour custom extent and epsilon', () => {
    const t = computeRenderTransform({ min: [0, 0, 0], max: [0, 0, 0] }, { targetExtent: 1, epsilon: 0.5 });
    expect(t.scale).toBe(2);
  });
});
