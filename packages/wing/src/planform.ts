/**
 * Elliptical Planform Synthesizer — a full station table from a handful
 * of planform parameters.
 *
 * Chord follows a quarter ellipse from root to tip; twist and (unless
 * trailing edges are aligned) chordwise offset go linearly; the profile
 * switches from root to tip inside a blend window.
 */

import { type ProfileRef, inlineProfile, resolveProfile } from './profile.js';
import { blendProfiles, clamp01 } from './blend.js';
import { planSpanPositions } from './span.js';
import type { Station } from './station.js';

/** Stand-in divisor for a zero or negative span. */
const MIN_SPAN = 1e-9;

export interface PlanformParams {
  span: number;
  rootChord: number;
  tipChord: number;
  stationCount: number;
  rootTwist: number;
  tipTwist: number;
  rootOffset: number;
  tipOffset: number;
  /** Keep the trailing edge at rootOffset + rootChord; tipOffset is then unused. */
  alignTrailingEdge: boolean;
  /** Extra chordwise offset per mm of span, added after alignment. */
  sweepRate: number;
  rootProfile: ProfileRef;
  tipProfile: ProfileRef;
  /** Span fraction where the blend to the tip profile starts. */
  profileTransition: number;
  /** Span fraction the blend takes. 0 = hard switch. */
  profileBlendWidth: number;
  /** Longest allowed gap between stations, mm. 0 = no refinement. */
  maxSegmentLength: number;
}

function spanFraction(y: number, span: number): number {
  return clamp01(y / (span > 0 ? span : MIN_SPAN));
}

/** Elliptical chord at span position y: rootChord at 0, tipChord at span. */
export function ellipticalChord(y: number, span: number, rootChord: number, tipChord: number): number {
  const t = spanFraction(y, span);
  return tipChord + (rootChord - tipChord) * Math.sqrt(Math.max(0, 1 - t * t));
}

/** 0 = root profile, 1 = tip profile, linear across the blend window. */
export function profileMixAt(t: number, transition: number, width: number): number {
  if (!(width > 0)) return t >= transition ? 1 : 0;
  return clamp01((t - transition) / width);
}

export function synthesizeEllipticalPlanform(params: PlanformParams): Station[] {
  const {
    span, rootChord, tipChord, rootTwist, tipTwist, rootOffset, tipOffset,
    alignTrailingEdge, sweepRate, rootProfile, tipProfile,
    profileTransition, profileBlendWidth,
  } = params;
  const rootPoints = resolveProfile(rootProfile);
  const tipPoints = resolveProfile(tipProfile);

  return planSpanPositions(span, params.stationCount, params.maxSegmentLength).map(y => {
    const t = spanFraction(y, span);
    const chord = ellipticalChord(y, span, rootChord, tipChord);
    const mix = profileMixAt(t, profileTransition, profileBlendWidth);
    const profile = mix <= 0
      ? rootProfile
      : mix >= 1
        ? tipProfile
        : inlineProfile(blendProfiles(rootPoints, tipPoints, mix));
    const base = alignTrailingEdge
      ? rootOffset + rootChord - chord
      : rootOffset + (tipOffset - rootOffset) * t;
    return {
      span: y,
      chord,
      twist: rootTwist + (tipTwist - rootTwist) * t,
      offset: base + sweepRate * y,
      profile,
    };
  });
}
