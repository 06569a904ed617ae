/**
 * Fluent API — the DSL surface of the kernel.
 *
 *   hull(extrude(polygon(a), 0.1), extrude(polygon(b), 0.1).translate(0, 0, 50))
 *
 * All functions return nodes. Composition is just method chaining.
 */

import { type Solid, Extrude, Hull, Union } from './solid.js';
import { type Profile2D, Polygon2D } from './profile2d.js';

// ─── 2D Profile constructors ──────────────────────────────────

/** 2D polygon profile from vertices. Min 3 vertices. Handles convex + concave. */
export function polygon(vertices: readonly (readonly [number, number])[]): Polygon2D {
  return new Polygon2D(vertices);
}

// ─── 2D → 3D constructors ─────────────────────────────────────

/** Extrude a 2D profile along Z by height (centered at z=0). */
export function extrude(profile: Profile2D, height: number): Solid {
  return new Extrude(profile, height);
}

// ─── Standalone combination constructors ─────────────────────

export function hull(...shapes: Solid[]): Solid {
  if (shapes.length === 0) throw new Error('hull requires at least one shape');
  return new Hull(shapes);
}

export function union(...shapes: Solid[]): Solid {
  if (shapes.length === 0) throw new Error('union requires at least one shape');
  if (shapes.length === 1) return shapes[0];
  return new Union(shapes);
}
