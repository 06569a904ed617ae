import { describe, it, expect } from 'vitest';
import { placeSection, placeStation, station, inlineProfile } from '../src/index.js';
import type { Point2 } from '../src/index.js';

const TOL = 9;

// Thin rectangle "airfoil": chord 1, thickness 0.1, counter-clockwise
const SLAB: Point2[] = [[0, 0], [1, 0], [1, 0.1], [0, 0.1]];

describe('placeSection', () => {
  const s = placeSection(SLAB, 100, 50, 0, 10, 0.2);

  it('scales by chord and moves to (offset, span, 0)', () => {
    const b = s.bounds();
    expect(b.min[0]).toBeCloseTo(10, TOL);
    expect(b.max[0]).toBeCloseTo(110, TOL);
    expect(b.min[2]).toBeCloseTo(0, TOL);
    expect(b.max[2]).toBeCloseTo(10, TOL);
  });

  it('is a thin slice centered on the span position', () => {
    const b = s.bounds();
    expect(b.min[1]).toBeCloseTo(49.9, TOL);
    expect(b.max[1]).toBeCloseTo(50.1, TOL);
  });

  it('points profile thickness up whatever the winding', () => {
    const cw = placeSection([...SLAB].reverse(), 100, 50, 0, 10, 0.2);
    const b = cw.bounds();
    expect(b.min[2]).toBeCloseTo(0, TOL);
    expect(b.max[2]).toBeCloseTo(10, TOL);
  });

  it('twists nose up about the leading edge before the offset', () => {
    const twisted = placeSection(SLAB, 100, 0, 10, 10, 0.2);
    const rad = 10 * Math.PI / 180;
    const b = twisted.bounds();
    // leading edge stays at x = offset; trailing edge drops
    expect(b.min[0]).toBeCloseTo(10, TOL);
    expect(b.min[2]).toBeCloseTo(-100 * Math.sin(rad), TOL);
    expect(b.max[2]).toBeCloseTo(10 * Math.cos(rad), TOL);
    expect(b.max[0]).toBeCloseTo(10 + 100 * Math.cos(rad) + 10 * Math.sin(rad), TOL);
  });
});

describe('placeStation', () => {
  it('resolves a built-in profile', () => {
    const b = placeStation(station(300, 160, 0, 0, 1)).bounds();
    expect(b.min[0]).toBeCloseTo(0, TOL);
    expect(b.max[0]).toBeCloseTo(160, TOL);
    expect(b.max[2]).toBeCloseTo(160 * 0.059988, TOL);
    expect(b.min[2]).toBeCloseTo(-160 * 0.059988, TOL);
    expect(b.min[1]).toBeCloseTo(299.95, TOL);
    expect(b.max[1]).toBeCloseTo(300.05, TOL);
  });

  it('uses inline points as given', () => {
    const b = placeStation(station(0, 20, 0, 0, inlineProfile(SLAB)), 1).bounds();
    expect(b.max[0]).toBeCloseTo(20, TOL);
    expect(b.max[2]).toBeCloseTo(2, TOL);
    expect(b.max[1]).toBeCloseTo(0.5, TOL);
  });
});
