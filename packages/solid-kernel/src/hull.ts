/**
 * Convex hull of a 3D point cloud, built on three.js' QuickHull.
 */

import { Vector3 } from 'three';
import { ConvexHull } from 'three/addons/math/ConvexHull.js';
import type { Vec3 } from './vec3.js';
import { makeMesh, meshVolume, type TriangleMesh } from './mesh.js';

/**
 * Minimal convex solid enclosing every point.
 * Faces are fan-triangulated and wound counter-clockwise seen from outside.
 * Throws when the points do not span a volume.
 */
export function convexHull(points: readonly Vec3[]): TriangleMesh {
  if (points.length < 4) {
    throw new Error(`convexHull needs at least 4 points, got ${points.length}`);
  }
  const input = points.map(p => new Vector3(p[0], p[1], p[2]));
  const hull = new ConvexHull().setFromPoints(input);

  const vertices: Vec3[] = [];
  const indices: number[] = [];
  const slot = new Map<Vector3, number>();
  const indexOf = (v: Vector3): number => {
    let i = slot.get(v);
    if (i === undefined) {
      i = vertices.length;
      vertices.push([v.x, v.y, v.z]);
      slot.set(v, i);
    }
    return i;
  };

  for (const face of hull.faces) {
    const ring: number[] = [];
    const start = face.edge;
    let edge: typeof start | null = start;
    while (edge) {
      ring.push(indexOf(edge.head().point));
      edge = edge.next;
      if (edge === start) break;
    }

    for (let k = 1; k + 1 < ring.length; k++) {
      indices.push(ring[0], ring[k], ring[k + 1]);
    }
  }

  const mesh = makeMesh(vertices, indices);
  const { min, max } = mesh.bounds;
  const extent = Math.max(max[0] - min[0], max[1] - min[1], max[2] - min[2]);
  if (mesh.triangleCount < 4 || !(meshVolume(mesh) > 1e-9 * extent ** 3)) {
    throw new Error(
      `convexHull input is degenerate: ${points.length} points span no volume (coplanar or collinear)`
    );
  }
  return mesh;
}
