/**
 * Panel lofting and wing assembly — panel counts, poses and symmetry.
 */

import { describe, it, expect } from 'vitest';
import { meshVolume } from '@wingloft/solid-kernel';
import { loftPanel, assembleWing, station, inlineProfile, synthesizeEllipticalPlanform, profileById } from '../src/index.js';
import type { Station } from '../src/index.js';

const TOL = 9;
const SLAB = inlineProfile([[0, 0], [1, 0], [1, 0.1], [0, 0.1]]);

/** Two rectangular stations 50mm apart: the panel is a 100 × 50.1 × 10 box. */
const boxTable: Station[] = [
  station(0, 100, 0, 0, SLAB),
  station(50, 100, 0, 0, SLAB),
];

describe('loftPanel', () => {
  it('hulls the two sections', () => {
    const p = loftPanel(boxTable[0], boxTable[1]);
    const b = p.bounds();
    expect(b.min[1]).toBeCloseTo(-0.05, TOL);
    expect(b.max[1]).toBeCloseTo(50.05, TOL);
    expect(meshVolume(p.mesh())).toBeCloseTo(100 * 10 * 50.1, 6);
  });

  it('tapers between unequal chords', () => {
    const p = loftPanel(station(0, 100, 0, 0, SLAB), station(50, 50, 0, 25, SLAB));
    const b = p.bounds();
    expect(b.min[0]).toBeCloseTo(0, TOL);
    expect(b.max[0]).toBeCloseTo(100, TOL);
    expect(b.max[2]).toBeCloseTo(10, TOL);
  });
});

describe('assembleWing', () => {
  it('builds one panel per adjacent station pair', () => {
    for (const stationCount of [2, 3, 7]) {
      const table = synthesizeEllipticalPlanform({
        span: 300, rootChord: 80, tipChord: 30, stationCount,
        rootTwist: 0, tipTwist: -2, rootOffset: 0, tipOffset: 0,
        alignTrailingEdge: false, sweepRate: 0,
        rootProfile: profileById(0), tipProfile: profileById(1),
        profileTransition: 0.5, profileBlendWidth: 0.3, maxSegmentLength: 0,
      });
      expect(assembleWing(table).panels).toHaveLength(stationCount - 1);
    }
  });

  it('lofts a hand-authored three-station table into two panels', () => {
    // Profile A (id 0, cambered) to A, then A to B (id 1, symmetric)
    const table = [
      station(0, 160, 0, 0, 0),
      station(425, 140, 0, 12.5, 0),
      station(600, 40, 0, 120, 1),
    ];
    const { panels } = assembleWing(table);
    expect(panels).toHaveLength(2);

    const outer = panels[1].mesh().vertices;
    const b = panels[1].bounds();
    expect(b.min[0]).toBeCloseTo(12.5, TOL);
    expect(b.max[0]).toBeCloseTo(160, TOL);

    // Tip face carries the symmetric profile, root face the cambered one
    const zs = (pick: (y: number) => boolean) => outer.filter(v => pick(v[1])).map(v => v[2]);
    const tipZ = zs(y => y > 600);
    const rootZ = zs(y => y < 425);
    expect(Math.max(...tipZ)).toBeCloseTo(40 * 0.059988, TOL);
    expect(Math.min(...tipZ)).toBeCloseTo(-40 * 0.059988, TOL);
    expect(Math.max(...rootZ)).toBeCloseTo(140 * 0.07893, TOL);
    expect(Math.min(...rootZ)).toBeCloseTo(-140 * 0.042261, TOL);
  });

  it('mirrors the left half onto negative span', () => {
    const { right, left } = assembleWing(boxTable, { dihedral: 5, angleOfAttack: 3 });
    const r = right.mesh().vertices;
    const l = left.mesh().vertices;
    expect(l).toHaveLength(r.length);
    l.forEach((v, i) => {
      expect(v[0]).toBe(r[i][0]);
      expect(v[1]).toBe(-r[i][1]);
      expect(v[2]).toBe(r[i][2]);
    });
  });

  it('raises both tips with positive dihedral', () => {
    const rad = 10 * Math.PI / 180;
    const { right, left } = assembleWing(boxTable, { dihedral: 10 });
    const top = 50.05 * Math.sin(rad) + 10 * Math.cos(rad);
    expect(right.bounds().max[2]).toBeCloseTo(top, TOL);
    expect(left.bounds().max[2]).toBeCloseTo(top, TOL);
  });

  it('pitches the whole wing nose up with positive angle of attack', () => {
    const rad = 5 * Math.PI / 180;
    const { wing } = assembleWing(boxTable, { angleOfAttack: 5 });
    expect(wing.bounds().min[2]).toBeCloseTo(-100 * Math.sin(rad), TOL);
    expect(wing.bounds().min[1]).toBeCloseTo(-50.05, TOL);
  });

  it('carries both halves in the wing unless mirroring is off', () => {
    const both = assembleWing(boxTable);
    expect(both.wing.mesh().triangleCount).toBe(2 * both.half.mesh().triangleCount);
    expect(meshVolume(both.wing.mesh())).toBeCloseTo(2 * 100 * 10 * 50.1, 6);

    const one = assembleWing(boxTable, { mirror: false });
    expect(one.wing.mesh().triangleCount).toBe(one.half.mesh().triangleCount);
    expect(one.wing.bounds().min[1]).toBeCloseTo(-0.05, TOL);
  });

  it('needs at least two stations', () => {
    expect(() => assembleWing([boxTable[0]])).toThrow('at least 2 stations');
  });
});
