/**
 * Build Registry — in-memory named wing builds.
 *
 * build_wing stores its result here and every tool answers with a
 * structured readback, so the caller always knows what exists.
 */

import type { SolidReadback } from '@wingloft/solid-kernel';
import type { WingBuild } from '@wingloft/wing';

export interface BuildEntry {
  id: string;
  build: WingBuild;
}

export interface BuildResult {
  build_id: string;
  type: 'wing';
  station_count: number;
  panel_count: number;
  triangle_count: number;
  mirrored: boolean;
  readback: SolidReadback;
}

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

let nextId = 1;

const builds = new Map<string, BuildEntry>();

function summarize(entry: BuildEntry): BuildResult {
  const { build } = entry;
  return {
    build_id: entry.id,
    type: 'wing',
    station_count: build.stations.length,
    panel_count: build.panels.length,
    triangle_count: build.wing.mesh().triangleCount,
    mirrored: build.config.mirror,
    readback: build.wing.readback(),
  };
}

/** Throw unless `name` is usable as an id or file name. */
export function validateName(name: string, what = 'build'): void {
  if (!NAME_PATTERN.test(name)) {
    throw new Error(
      `Invalid ${what} name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
}

/** Store a build and return its ID + readback. A named build replaces any previous one. */
export function create(build: WingBuild, name?: string): BuildResult {
  if (name !== undefined) validateName(name);
  let id = name ?? `wing_${nextId++}`;
  while (name === undefined && builds.has(id)) {
    id = `wing_${nextId++}`;
  }
  const entry = { id, build };
  builds.set(id, entry);
  return summarize(entry);
}

/** Retrieve a build or throw naming the available ones. */
export function get(id: string): BuildEntry {
  const entry = builds.get(id);
  if (!entry) {
    const available = [...builds.keys()];
    throw new Error(
      `Build "${id}" not found. Available builds: [${available.join(', ')}]`
    );
  }
  return entry;
}

/** Readback of one stored build. */
export function readback(id: string): BuildResult {
  return summarize(get(id));
}

export function remove(id: string): void {
  if (!builds.has(id)) {
    throw new Error(`Build "${id}" not found, cannot delete.`);
  }
  builds.delete(id);
}

export function has(id: string): boolean {
  return builds.has(id);
}

/** All builds with their readbacks, in creation order. */
export function list(): BuildResult[] {
  return [...builds.values()].map(summarize);
}

/** Drop every build and restart auto ids (for testing). */
export function clear(): void {
  builds.clear();
  nextId = 1;
}
