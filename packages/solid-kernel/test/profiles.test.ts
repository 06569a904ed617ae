/**
 * Tests for 2D profiles (Polygon2D) and the 2D→3D bridge (Extrude).
 */

import { describe, it, expect } from 'vitest';
import { polygon, extrude, meshVolume } from '../src/index.js';

// ─── Polygon2D ─────────────────────────────────────────────────

describe('Polygon2D', () => {
  const square = polygon([[0, 0], [10, 0], [10, 10], [0, 10]]);

  it('bounds a unit-chord outline', () => {
    const b = polygon([[0, 0], [0.3, 0.06], [1, 0], [0.3, -0.04]]).bounds2d();
    expect(b.min).toEqual([0, -0.04]);
    expect(b.max).toEqual([1, 0.06]);
  });

  it('signed area is positive counter-clockwise, negative clockwise', () => {
    expect(square.signedArea()).toBeCloseTo(100);
    const cw = polygon([[0, 0], [0, 10], [10, 10], [10, 0]]);
    expect(cw.signedArea()).toBeCloseTo(-100);
  });

  it('drops a closing vertex that repeats the first', () => {
    const closed = polygon([[0, 0], [10, 0], [10, 10], [0, 0]]);
    expect(closed.vertices()).toHaveLength(3);
  });

  it('scaled copy scales about the origin', () => {
    const b = square.scaled(2).bounds2d();
    expect(b.max).toEqual([20, 20]);
  });

  it('rejects fewer than 3 vertices', () => {
    expect(() => polygon([[0, 0], [1, 0]])).toThrow('at least 3 vertices');
  });

  it('names itself by vertex count', () => {
    expect(square.name).toBe('polygon2d(4 vertices)');
  });

  it('rejects non-finite vertices', () => {
    expect(() => polygon([[0, 0], [1, 0], [NaN, 1]])).toThrow('not finite');
  });
});

// ─── Extrude ───────────────────────────────────────────────────

describe('Extrude', () => {
  const square = polygon([[0, 0], [10, 0], [10, 10], [0, 10]]);
  const prism = extrude(square, 4);

  it('is centered on z=0', () => {
    const b = prism.bounds();
    expect(b.min).toEqual([0, 0, -2]);
    expect(b.max).toEqual([10, 10, 2]);
  });

  it('has two caps and one quad per edge', () => {
    const m = prism.mesh();
    expect(m.vertexCount).toBe(8);
    expect(m.triangleCount).toBe(12);
  });

  it('is a closed, outward-wound solid', () => {
    expect(meshVolume(prism.mesh())).toBeCloseTo(400, 6);
  });

  it('winds outward for clockwise input too', () => {
    const cw = extrude(polygon([[0, 0], [0, 10], [10, 10], [10, 0]]), 4);
    expect(meshVolume(cw.mesh())).toBeCloseTo(400, 6);
  });

  it('triangulates concave caps', () => {
    const l = extrude(polygon([
      [0, 0], [20, 0], [20, 10], [10, 10], [10, 20], [0, 20],
    ]), 2);
    expect(l.mesh().triangleCount).toBe(20);
    expect(meshVolume(l.mesh())).toBeCloseTo(600, 6);
  });

  it('rejects non-positive height', () => {
    expect(() => extrude(square, 0)).toThrow('height must be positive');
    expect(() => extrude(square, -5)).toThrow('height must be positive');
  });

  it('names itself after its profile', () => {
    expect(prism.name).toBe('extrude(polygon2d(4 vertices), h=4)');
  });
});
