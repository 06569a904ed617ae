import { type Solid, hull } from '@wingloft/solid-kernel';
import { placeStation, SECTION_THICKNESS } from './section.js';
import type { Station } from './station.js';

/**
 * Panel Lofter — the solid between two adjacent stations.
 *
 * The convex hull of both sections. Between dissimilar or strongly
 * cambered profiles it over-fills concave regions of the true loft.
 */
export function loftPanel(root: Station, tip: Station, thickness = SECTION_THICKNESS): Solid {
  return hull(placeStation(root, thickness), placeStation(tip, thickness));
}
