/** Minimal 2D/3D vectors — plain tuples for speed, helpers for clarity. */
export type Vec2 = [number, number];
export type Vec3 = [number, number, number];

/** Axis-aligned bounding box. */
export interface BoundingBox { min: Vec3; max: Vec3; }

export type Axis = 'x' | 'y' | 'z';

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function length(a: Vec3): number {
  return Math.sqrt(a[0] * a[0] + a[1] * a[1] + a[2] * a[2]);
}

export function normalize(a: Vec3): Vec3 {
  const l = length(a);
  return l > 0 ? [a[0] / l, a[1] / l, a[2] / l] : [0, 0, 0];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/** Index of an axis inside a Vec3. */
export function axisIndex(axis: Axis): 0 | 1 | 2 {
  return axis === 'x' ? 0 : axis === 'y' ? 1 : 2;
}

/**
 * Rotate p about a principal axis by deg (right-handed).
 *
 *   rotateAbout([1, 0, 0], 'z', 90)  →  [0, 1, 0]
 */
export function rotateAbout(p: Vec3, axis: Axis, deg: number): Vec3 {
  const rad = deg * Math.PI / 180;
  const c = Math.cos(rad);
  const s = Math.sin(rad);
  switch (axis) {
    case 'x': return [p[0], c * p[1] - s * p[2], s * p[1] + c * p[2]];
    case 'y': return [c * p[0] + s * p[2], p[1], -s * p[0] + c * p[2]];
    case 'z': return [c * p[0] - s * p[1], s * p[0] + c * p[1], p[2]];
  }
}
