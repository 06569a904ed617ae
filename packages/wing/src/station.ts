/**
 * Stations — one spanwise cross-section each.
 */

import { type ProfileRef, profileById } from './profile.js';

export interface Station {
  /** Spanwise position, mm. Strictly increasing along a table. */
  readonly span: number;
  /** Chord length, mm. Never negative. */
  readonly chord: number;
  /** Twist about the span axis, degrees. Positive = leading edge up. */
  readonly twist: number;
  /** Chordwise position of the leading edge, mm. Positive = aft. */
  readonly offset: number;
  readonly profile: ProfileRef;
}

/** Ordered stations, root first. At least two. */
export type StationTable = readonly Station[];

/**
 * Hand-authoring shorthand; a bare number is a built-in profile id.
 *
 *   station(425, 140, 0, 12.5, 0)
 */
export function station(
  span: number,
  chord: number,
  twist: number,
  offset: number,
  profile: ProfileRef | number,
): Station {
  return {
    span,
    chord,
    twist,
    offset,
    profile: typeof profile === 'number' ? profileById(profile) : profile,
  };
}

/** First index i where table[i + 1].span <= table[i].span, or -1. */
export function findSpanOrderViolation(table: StationTable): number {
  for (let i = 0; i + 1 < table.length; i++) {
    if (!(table[i + 1].span > table[i].span)) return i;
  }
  return -1;
}
