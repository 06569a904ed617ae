/**
 * Profiles and profile references.
 *
 * A Profile is a unit-chord airfoil outline walked leading edge →
 * trailing edge → back. Stations refer to one either by built-in id or by
 * carrying the points inline:
 *
 *   resolveProfile(profileById(1))            →  the naca0012 outline
 *   resolveProfile(inlineProfile(points))     →  points, unchanged
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { PointSchema } from './profile-source.js';

export type Point2 = readonly [number, number];
export type Profile = readonly Point2[];

export type ProfileRef =
  | { readonly kind: 'id'; readonly id: number }
  | { readonly kind: 'inline'; readonly points: Profile };

export function profileById(id: number): ProfileRef {
  return { kind: 'id', id };
}

export function inlineProfile(points: Profile): ProfileRef {
  return { kind: 'inline', points };
}

// ─── Built-in registry ─────────────────────────────────────────

const ProfileLibrarySchema = z.object({
  profiles: z.array(z.object({
    id: z.number().int().nonnegative(),
    name: z.string().min(1),
    points: z.array(PointSchema).min(3),
  })),
});

interface BuiltinProfile {
  id: number;
  name: string;
  points: Profile;
}

const LIBRARY_URL = new URL('../data/profiles.json', import.meta.url);

const builtins: ReadonlyMap<number, BuiltinProfile> = new Map(
  ProfileLibrarySchema.parse(JSON.parse(fs.readFileSync(LIBRARY_URL, 'utf-8')))
    .profiles.map((p): [number, BuiltinProfile] => [p.id, p]),
);

/** Id every unrecognised reference resolves to (naca2412). */
export const DEFAULT_PROFILE_ID = 0;

if (!builtins.has(DEFAULT_PROFILE_ID)) {
  throw new Error(`Profile library ${LIBRARY_URL.pathname} has no default profile (id ${DEFAULT_PROFILE_ID})`);
}

export function isBuiltinProfileId(id: number): boolean {
  return builtins.has(id);
}

/**
 * Fallback policy for profile ids: known ids map to themselves, anything
 * else to DEFAULT_PROFILE_ID. Resolution never fails on an id.
 */
export function fallbackProfileId(id: number): number {
  return builtins.has(id) ? id : DEFAULT_PROFILE_ID;
}

export interface ProfileInfo {
  id: number;
  name: string;
  pointCount: number;
}

/** Built-in profiles in id order. */
export function listProfiles(): ProfileInfo[] {
  return [...builtins.values()]
    .sort((a, b) => a.id - b.id)
    .map(p => ({ id: p.id, name: p.name, pointCount: p.points.length }));
}

// ─── Resolution ────────────────────────────────────────────────

export function resolveProfile(ref: ProfileRef): Profile {
  switch (ref.kind) {
    case 'inline':
      return ref.points;
    case 'id': {
      const entry = builtins.get(fallbackProfileId(ref.id));
      if (!entry) throw new Error(`Profile library has no entry for id ${ref.id}`);
      return entry.points;
    }
  }
}

/** Short label for readback: the built-in name, or `inline(N points)`. */
export function describeProfileRef(ref: ProfileRef): string {
  if (ref.kind === 'inline') return `inline(${ref.points.length} points)`;
  const id = fallbackProfileId(ref.id);
  const name = builtins.get(id)?.name ?? 'unknown';
  return id === ref.id ? name : `${name} (fallback for ${ref.id})`;
}
