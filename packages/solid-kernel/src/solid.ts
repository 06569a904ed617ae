/**
 * Solid Node — the core of the kernel.
 *
 * Every shape is a Solid node. Nodes compose via hulls and unions, and
 * rigid transforms chain fluently:
 *
 *   extrude(polygon(pts), 0.1).rotateX(90).translate(12, 425, 0)
 *
 * Nodes are immutable. Each evaluates to a triangle mesh on first use and
 * keeps it, so a subtree shared by two parents is only meshed once.
 */

import { ShapeUtils, Vector2 } from 'three';
import { type Axis, type Vec3, type BoundingBox, add, axisIndex, rotateAbout } from './vec3.js';
import type { Profile2D } from './profile2d.js';
import { type TriangleMesh, makeMesh, mergeMeshes } from './mesh.js';
import { convexHull } from './hull.js';

// ─── Base class ────────────────────────────────────────────────

export abstract class Solid {
  private cachedMesh: TriangleMesh | null = null;

  /** Human-readable name for readback. */
  abstract get name(): string;

  /** Evaluate this node to a fresh mesh. */
  protected abstract build(): TriangleMesh;

  /** Triangle mesh of this solid, evaluated once. */
  mesh(): TriangleMesh {
    if (this.cachedMesh === null) {
      this.cachedMesh = this.build();
    }
    return this.cachedMesh;
  }

  /** Exact axis-aligned bounds of the mesh vertices. */
  bounds(): BoundingBox {
    return this.mesh().bounds;
  }

  /**
   * Structured readback — what a tool caller sees after every step.
   */
  readback(): SolidReadback {
    const b = this.bounds();
    const size: Vec3 = [b.max[0] - b.min[0], b.max[1] - b.min[1], b.max[2] - b.min[2]];
    return {
      name: this.name,
      bounds: b,
      size,
      center: [(b.min[0] + b.max[0]) / 2, (b.min[1] + b.max[1]) / 2, (b.min[2] + b.max[2]) / 2],
    };
  }

  // ─── Transform operations (fluent) ─────────────────────────

  translate(x: number, y: number, z: number): Solid { return new Translate(this, [x, y, z]); }
  rotateX(deg: number): Solid { return new RotateAxis(this, 'x', deg); }
  rotateY(deg: number): Solid { return new RotateAxis(this, 'y', deg); }
  mirror(axis: Axis): Solid { return new Mirror(this, axis); }
}

// ─── Readback type ─────────────────────────────────────────────

export interface SolidReadback {
  name: string;
  bounds: BoundingBox;
  size: Vec3;
  center: Vec3;
}

// ─── 2D → 3D Bridge ────────────────────────────────────────────

/**
 * Linear extrude: a prism built by sweeping a 2D profile along Z.
 * Centered: extends from -height/2 to +height/2.
 *
 * The profile ring is re-ordered counter-clockwise first, so the mesh is
 * wound outward whichever way the caller walked the outline.
 */
export class Extrude extends Solid {
  readonly kind = 'extrude' as const;
  private readonly halfH: number;

  constructor(readonly profile: Profile2D, readonly height: number) {
    super();
    if (!(height > 0)) throw new Error(`Extrude height must be positive, got ${height}`);
    this.halfH = height / 2;
  }

  get name() { return `extrude(${this.profile.name}, h=${this.height})`; }

  protected build(): TriangleMesh {
    const ring = [...this.profile.vertices()];
    if (this.profile.signedArea() < 0) ring.reverse();
    const n = ring.length;
    const h = this.halfH;

    const vertices: Vec3[] = [
      ...ring.map(([x, y]): Vec3 => [x, y, -h]),
      ...ring.map(([x, y]): Vec3 => [x, y, h]),
    ];
    const indices: number[] = [];

    // Caps — ear clipping, then each triangle forced to face its cap normal
    const contour = ring.map(([x, y]) => new Vector2(x, y));
    for (const [a, b, c] of ShapeUtils.triangulateShape(contour, [])) {
      const ccw = ShapeUtils.area([contour[a], contour[b], contour[c]]) >= 0;
      const [p, q] = ccw ? [b, c] : [c, b];
      indices.push(a + n, p + n, q + n); // top, facing +Z
      indices.push(a, q, p);             // bottom, facing -Z
    }

    // Side walls — one quad per outline edge
    for (let i = 0; i < n; i++) {
      const j = (i + 1) % n;
      indices.push(i, j, j + n);
      indices.push(i, j + n, i + n);
    }

    return makeMesh(vertices, indices);
  }
}

// ─── Combinations ──────────────────────────────────────────────

/** Minimal convex solid enclosing every vertex of every child. */
export class Hull extends Solid {
  readonly kind = 'hull' as const;

  constructor(readonly parts: readonly Solid[]) {
    super();
    if (parts.length === 0) throw new Error('hull requires at least one shape');
  }

  get name() { return `hull(${this.parts.map(p => p.name).join(', ')})`; }

  protected build(): TriangleMesh {
    return convexHull(this.parts.flatMap(p => p.mesh().vertices));
  }
}

/**
 * Compound of child meshes. Children are kept as separate shells;
 * volumes where they overlap are not merged.
 */
export class Union extends Solid {
  readonly kind = 'union' as const;

  constructor(readonly parts: readonly Solid[]) {
    super();
    if (parts.length === 0) throw new Error('union requires at least one shape');
  }

  get name() {
    return this.parts.length <= 3
      ? `union(${this.parts.map(p => p.name).join(', ')})`
      : `union(${this.parts.length} parts)`;
  }

  protected build(): TriangleMesh {
    return mergeMeshes(this.parts.map(p => p.mesh()));
  }
}

// ─── Transforms ────────────────────────────────────────────────

export class Translate extends Solid {
  readonly kind = 'translate' as const;
  constructor(readonly child: Solid, readonly offset: Vec3) { super(); }
  get name() { return `${this.child.name}.translate(${this.offset.join(', ')})`; }
  protected build(): TriangleMesh {
    const m = this.child.mesh();
    return makeMesh(m.vertices.map(v => add(v, this.offset)), m.indices);
  }
}

export class RotateAxis extends Solid {
  readonly kind = 'rotateAxis' as const;
  constructor(readonly child: Solid, readonly axis: Axis, readonly deg: number) { super(); }
  get name() { return `${this.child.name}.rotate${this.axis.toUpperCase()}(${this.deg})`; }
  protected build(): TriangleMesh {
    const m = this.child.mesh();
    if (this.deg === 0) return m;
    return makeMesh(m.vertices.map(v => rotateAbout(v, this.axis, this.deg)), m.indices);
  }
}

/**
 * Reflection through the plane normal to `axis` at the origin.
 * Triangle winding is reversed so normals keep pointing outward.
 */
export class Mirror extends Solid {
  readonly kind = 'mirror' as const;
  constructor(readonly child: Solid, readonly axis: Axis) { super(); }
  get name() { return `${this.child.name}.mirror(${this.axis})`; }
  protected build(): TriangleMesh {
    const m = this.child.mesh();
    const i = axisIndex(this.axis);
    const vertices = m.vertices.map(v => {
      const r: Vec3 = [v[0], v[1], v[2]];
      r[i] = -r[i];
      return r;
    });
    const indices: number[] = [];
    for (let t = 0; t < m.indices.length; t += 3) {
      indices.push(m.indices[t], m.indices[t + 2], m.indices[t + 1]);
    }
    return makeMesh(vertices, indices);
  }
}
