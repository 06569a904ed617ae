/**
 * Profile sources — airfoil coordinate files and the text converter.
 *
 *   parseProfileText('# NACA 2412\n1.0 0.0\n0.5, 0.06\n...')  →  [[1, 0], [0.5, 0.06]]
 *
 * A profile source file is JSON: { "name": "...", "source"?: "...", "points": [[x, y], ...] }.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import type { Point2 } from './profile.js';

export const PointSchema = z.tuple([z.number().finite(), z.number().finite()]);

export const ProfileSourceSchema = z.object({
  name: z.string().min(1),
  source: z.string().optional(),
  points: z.array(PointSchema),
});

export type ProfileSource = z.infer<typeof ProfileSourceSchema>;

const COMMENT_MARKER = '#';
const ELLIPSIS = '...';

/**
 * Parse whitespace- or comma-separated `x y` lines into points.
 * Blank lines, `#` comments, `...` placeholder lines and lines with fewer
 * than two fields are skipped. Extra fields after the first two are ignored.
 */
export function parseProfileText(text: string): Point2[] {
  const points: Point2[] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (line === '' || line.startsWith(COMMENT_MARKER) || line.includes(ELLIPSIS)) return;
    const fields = line.replace(/,/g, ' ').split(/\s+/);
    if (fields.length < 2) return;
    const x = Number(fields[0]);
    const y = Number(fields[1]);
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new Error(`Line ${i + 1}: expected two numbers, got "${line}"`);
    }
    points.push([x, y]);
  });
  return points;
}

/** Serialize a named profile as a profile source file (6 decimals). */
export function formatProfileSource(name: string, points: readonly Point2[], source?: string): string {
  const round = (v: number) => Number(v.toFixed(6));
  const doc: ProfileSource = {
    name,
    ...(source !== undefined ? { source } : {}),
    points: points.map(([x, y]): [number, number] => [round(x), round(y)]),
  };
  return JSON.stringify(doc, null, 2) + '\n';
}

/** Read and validate a profile source file. */
export function readProfileSource(filePath: string): ProfileSource {
  const text = fs.readFileSync(filePath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Profile source "${filePath}" is not valid JSON: ${reason}`);
  }
  const parsed = ProfileSourceSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Profile source "${filePath}" is malformed: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

/** Convert a text coordinate file into a profile source file. Returns the points written. */
export function convertProfileFile(inputPath: string, name: string, outputPath: string): Point2[] {
  const points = parseProfileText(fs.readFileSync(inputPath, 'utf-8'));
  fs.writeFileSync(outputPath, formatProfileSource(name, points, inputPath), 'utf-8');
  return points;
}
