/**
 * STL export, binary and ASCII.
 *
 * Binary: 80-byte header + uint32 count + 50 bytes per triangle.
 * Face normals computed via cross product (standard for slicers).
 */

import { type Vec3, sub, cross, normalize } from './vec3.js';
import type { TriangleMesh } from './mesh.js';

interface Facet {
  normal: Vec3;
  corners: [Vec3, Vec3, Vec3];
}

function* facets(mesh: TriangleMesh): Generator<Facet> {
  if (mesh.triangleCount === 0) {
    throw new Error('Cannot export empty mesh (0 triangles)');
  }
  const { vertices, indices, triangleCount } = mesh;
  if (indices.length !== triangleCount * 3) {
    throw new Error(
      `Mesh data inconsistent: indices.length (${indices.length}) !== triangleCount * 3 (${triangleCount * 3})`
    );
  }
  for (let t = 0; t < triangleCount; t++) {
    const v0 = vertices[indices[t * 3]];
    const v1 = vertices[indices[t * 3 + 1]];
    const v2 = vertices[indices[t * 3 + 2]];
    yield { normal: normalize(cross(sub(v1, v0), sub(v2, v0))), corners: [v0, v1, v2] };
  }
}

export function exportSTL(mesh: TriangleMesh, header = 'wingloft'): ArrayBuffer {
  const headerBytes = new TextEncoder().encode(header);
  if (headerBytes.length > 80) {
    throw new Error(
      `STL header exceeds 80 bytes (got ${headerBytes.length}). Shorten the header string.`
    );
  }

  const buffer = new ArrayBuffer(84 + mesh.triangleCount * 50);
  const view = new DataView(buffer);
  headerBytes.forEach((b, i) => view.setUint8(i, b));
  view.setUint32(80, mesh.triangleCount, true);

  let offset = 84;
  const put = (v: Vec3) => {
    for (const c of v) {
      view.setFloat32(offset, c, true);
      offset += 4;
    }
  };
  for (const f of facets(mesh)) {
    put(f.normal);
    for (const corner of f.corners) put(corner);
    view.setUint16(offset, 0, true); // attribute byte count
    offset += 2;
  }

  return buffer;
}

/** ASCII STL. `solidName` must not contain whitespace. */
export function exportAsciiSTL(mesh: TriangleMesh, solidName = 'wingloft'): string {
  if (/\s/.test(solidName)) {
    throw new Error(`STL solid name "${solidName}" must not contain whitespace`);
  }
  const fmt = (v: Vec3) => v.map(c => c.toExponential(6)).join(' ');
  const lines = [`solid ${solidName}`];
  for (const f of facets(mesh)) {
    lines.push(`  facet normal ${fmt(f.normal)}`, '    outer loop');
    for (const corner of f.corners) lines.push(`      vertex ${fmt(corner)}`);
    lines.push('    endloop', '  endfacet');
  }
  lines.push(`endsolid ${solidName}`);
  return lines.join('\n') + '\n';
}
