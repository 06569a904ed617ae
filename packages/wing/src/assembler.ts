/**
 * Wing Assembler — panels → half wing → both halves, posed.
 *
 * Order of operations:
 *   1. loft a panel between every adjacent station pair, union them
 *   2. dihedral: rotate about the chordwise (X) axis, tip up for positive
 *   3. mirror the posed half through the XZ plane for the other side
 *   4. angle of attack: one rotation about the span (Y) axis, nose up
 *      for positive, applied to the assembled wing
 */

import { type Solid, union } from '@wingloft/solid-kernel';
import { loftPanel } from './panel.js';
import { SECTION_THICKNESS } from './section.js';
import type { StationTable } from './station.js';

export interface WingOptions {
  /** Degrees, tip up. */
  dihedral: number;
  /** Degrees, nose up. */
  angleOfAttack: number;
  sectionThickness: number;
  /** Include the mirrored half in `wing`. */
  mirror: boolean;
}

export const DEFAULT_WING_OPTIONS: WingOptions = {
  dihedral: 0,
  angleOfAttack: 0,
  sectionThickness: SECTION_THICKNESS,
  mirror: true,
};

export interface WingAssembly {
  /** One per adjacent station pair, unposed. */
  panels: Solid[];
  /** Union of the panels, unposed (+Y side). */
  half: Solid;
  /** +Y half with dihedral and angle of attack. */
  right: Solid;
  /** −Y half with dihedral and angle of attack. */
  left: Solid;
  /** Both halves (or only the right one when mirror is off), posed. */
  wing: Solid;
}

export function assembleWing(stations: StationTable, options: Partial<WingOptions> = {}): WingAssembly {
  const opts = { ...DEFAULT_WING_OPTIONS, ...options };
  if (stations.length < 2) {
    throw new Error(`A wing needs at least 2 stations to form a panel, got ${stations.length}`);
  }

  const panels: Solid[] = [];
  for (let i = 0; i + 1 < stations.length; i++) {
    panels.push(loftPanel(stations[i], stations[i + 1], opts.sectionThickness));
  }
  const half = union(...panels);

  const raised = half.rotateX(opts.dihedral);
  const mirrored = raised.mirror('y');
  const wing = (opts.mirror ? union(raised, mirrored) : raised).rotateY(opts.angleOfAttack);

  return {
    panels,
    half,
    right: raised.rotateY(opts.angleOfAttack),
    left: mirrored.rotateY(opts.angleOfAttack),
    wing,
  };
}
