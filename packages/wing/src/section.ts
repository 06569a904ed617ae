/**
 * Section Placer — one station as a thin solid in wing coordinates.
 *
 * Wing axes: X chordwise (aft positive), Y spanwise (root → tip),
 * Z up. A profile's x runs along X and its y along Z.
 */

import { type Solid, polygon, extrude } from '@wingloft/solid-kernel';
import { type Profile, resolveProfile } from './profile.js';
import type { Station } from './station.js';

/** Default spanwise thickness of a section slice, mm. */
export const SECTION_THICKNESS = 0.1;

/**
 * Scale → extrude across the span → twist about the leading edge →
 * move to (offset, span, 0).
 */
export function placeSection(
  profile: Profile,
  chord: number,
  span: number,
  twist: number,
  offset: number,
  thickness = SECTION_THICKNESS,
): Solid {
  return extrude(polygon(profile).scaled(chord), thickness)
    .rotateX(90)
    .rotateY(twist)
    .translate(offset, span, 0);
}

export function placeStation(s: Station, thickness = SECTION_THICKNESS): Solid {
  return placeSection(resolveProfile(s.profile), s.chord, s.span, s.twist, s.offset, thickness);
}
