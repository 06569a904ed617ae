/**
 * Profile2D — closed 2D outlines that become solids by extrusion.
 *
 *   extrude(polygon([[0,0], [50,0], [50,30], [0,30]]), 20)
 *
 * The outline is kept as an explicit vertex ring; extrusion and hulls
 * work on its real vertices.
 */

import type { Vec2 } from './vec3.js';

// ─── Bounding box ──────────────────────────────────────────────

export interface BoundingBox2D { min: Vec2; max: Vec2; }

// ─── Base class ────────────────────────────────────────────────

export abstract class Profile2D {
  /** Human-readable name for readback. */
  abstract get name(): string;

  /** Outline vertices in order, without a closing duplicate. */
  abstract vertices(): readonly Vec2[];

  /** Axis-aligned bounding box of the 2D shape. */
  abstract bounds2d(): BoundingBox2D;

  /** Shoelace area. Positive = counter-clockwise. */
  signedArea(): number {
    const v = this.vertices();
    let sum = 0;
    for (let i = 0, j = v.length - 1; i < v.length; j = i, i++) {
      sum += v[j][0] * v[i][1] - v[i][0] * v[j][1];
    }
    return sum / 2;
  }
}

// ─── Polygon2D ─────────────────────────────────────────────────

/**
 * Polygon outline, convex or concave, vertices in either winding.
 * At least 3 vertices; a last vertex repeating the first is dropped.
 */
export class Polygon2D extends Profile2D {
  readonly kind = 'polygon2d' as const;
  private readonly verts: Vec2[];
  private readonly cachedBounds: BoundingBox2D;

  constructor(vertices: readonly (readonly [number, number])[]) {
    super();
    const verts = vertices.map((v): Vec2 => [v[0], v[1]]);
    const first = verts[0];
    const last = verts[verts.length - 1];
    if (verts.length > 1 && first[0] === last[0] && first[1] === last[1]) {
      verts.pop();
    }
    if (verts.length < 3) {
      throw new Error(`Polygon2D requires at least 3 vertices, got ${verts.length}`);
    }
    if (verts.length > 10000) {
      throw new Error('Polygon2D supports at most 10,000 vertices');
    }
    for (const [x, y] of verts) {
      if (!Number.isFinite(x) || !Number.isFinite(y)) {
        throw new Error(`Polygon2D vertex [${x}, ${y}] is not finite`);
      }
    }
    this.verts = verts;

    const xs = verts.map(v => v[0]);
    const ys = verts.map(v => v[1]);
    this.cachedBounds = {
      min: [Math.min(...xs), Math.min(...ys)],
      max: [Math.max(...xs), Math.max(...ys)],
    };
  }

  get name(): string {
    return `polygon2d(${this.verts.length} vertices)`;
  }

  vertices(): readonly Vec2[] {
    return this.verts;
  }

  bounds2d(): BoundingBox2D {
    return this.cachedBounds;
  }

  /** Uniformly scaled copy about the origin. */
  scaled(factor: number): Polygon2D {
    return new Polygon2D(this.verts.map(([x, y]) => [x * factor, y * factor]));
  }
}
