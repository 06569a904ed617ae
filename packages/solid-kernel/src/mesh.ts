/**
 * Triangle mesh types and helpers — the evaluated form of every solid.
 */

import type { Vec3, BoundingBox } from './vec3.js';
import { cross, dot } from './vec3.js';

export interface TriangleMesh {
  /** Vertex positions. Shared between the triangles of one node. */
  vertices: Vec3[];
  /** Triangle indices into vertices[], groups of 3, counter-clockwise seen from outside. */
  indices: number[];
  vertexCount: number;
  triangleCount: number;
  bounds: BoundingBox;
}

export function meshBounds(vertices: readonly Vec3[]): BoundingBox {
  if (vertices.length === 0) return { min: [0, 0, 0], max: [0, 0, 0] };
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  for (const v of vertices) {
    for (let i = 0; i < 3; i++) {
      if (v[i] < min[i]) min[i] = v[i];
      if (v[i] > max[i]) max[i] = v[i];
    }
  }
  return { min, max };
}

/** Build a mesh record, filling in the derived counts and bounds. */
export function makeMesh(vertices: Vec3[], indices: number[]): TriangleMesh {
  if (indices.length % 3 !== 0) {
    throw new Error(`Mesh indices must come in groups of 3, got ${indices.length}`);
  }
  return {
    vertices,
    indices,
    vertexCount: vertices.length,
    triangleCount: indices.length / 3,
    bounds: meshBounds(vertices),
  };
}

/** Concatenate meshes into one compound. Overlapping volumes are not merged. */
export function mergeMeshes(meshes: readonly TriangleMesh[]): TriangleMesh {
  const vertices: Vec3[] = [];
  const indices: number[] = [];
  for (const m of meshes) {
    const base = vertices.length;
    vertices.push(...m.vertices);
    for (const i of m.indices) indices.push(base + i);
  }
  return makeMesh(vertices, indices);
}

/**
 * Enclosed volume by the divergence theorem.
 * Positive for outward-wound closed meshes.
 */
export function meshVolume(mesh: TriangleMesh): number {
  const { vertices, indices } = mesh;
  let sum = 0;
  for (let t = 0; t < indices.length; t += 3) {
    const a = vertices[indices[t]];
    const b = vertices[indices[t + 1]];
    const c = vertices[indices[t + 2]];
    sum += dot(a, cross(b, c));
  }
  return sum / 6;
}
