/**
 * STL export of stored builds into the server's output directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { exportSTL, exportAsciiSTL, type BoundingBox } from '@wingloft/solid-kernel';
import type { BuildEntry } from './registry.js';

export const WING_PARTS = ['wing', 'right', 'left', 'half'] as const;
export type WingPart = typeof WING_PARTS[number];

export type StlFormat = 'binary' | 'ascii';

export interface StlExportResult {
  build_id: string;
  type: 'stl_export';
  part: WingPart;
  format: StlFormat;
  file_path: string;
  file_size_bytes: number;
  triangle_count: number;
  bounds: BoundingBox;
}

/** `$TMPDIR/wingloft`, the only place the server writes. */
export function exportDir(): string {
  return path.join(process.env.TMPDIR ?? '/tmp', 'wingloft');
}

export function writeStl(
  entry: BuildEntry,
  part: WingPart,
  format: StlFormat,
  dir = exportDir(),
): StlExportResult {
  const mesh = entry.build[part].mesh();
  const label = `${entry.id}-${part}`;
  const data = format === 'ascii'
    ? Buffer.from(exportAsciiSTL(mesh, label), 'utf-8')
    : Buffer.from(exportSTL(mesh, label.slice(0, 80)));

  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, `${label}-${Date.now()}.stl`);
  fs.writeFileSync(filePath, data);

  return {
    build_id: entry.id,
    type: 'stl_export',
    part,
    format,
    file_path: filePath,
    file_size_bytes: data.byteLength,
    triangle_count: mesh.triangleCount,
    bounds: mesh.bounds,
  };
}
