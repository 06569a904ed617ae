/**
 * Build configuration — one explicit record per build.
 *
 *   buildWing(parseWingConfig({ span: 800, dihedral: 3 }))
 *
 * Every field is optional on input and filled from the defaults below.
 * Fractions outside [0, 1], non-positive spans and fractional station
 * counts are accepted; the pipeline clamps and truncates them.
 */

import { z } from 'zod';
import { type ProfileRef, profileById, inlineProfile } from './profile.js';
import { PointSchema } from './profile-source.js';
import { synthesizeEllipticalPlanform } from './planform.js';
import { assembleWing, type WingAssembly } from './assembler.js';
import { type Station, type StationTable, findSpanOrderViolation } from './station.js';
import { SECTION_THICKNESS } from './section.js';

/** A bare integer is shorthand for `{ kind: 'id', id }`. */
export const ProfileRefSchema = z.union([
  z.number().int(),
  z.object({ kind: z.literal('id'), id: z.number().int() }),
  z.object({ kind: z.literal('inline'), points: z.array(PointSchema).min(3) }),
]).transform((v): ProfileRef => {
  if (typeof v === 'number') return profileById(v);
  return v.kind === 'id' ? profileById(v.id) : inlineProfile(v.points);
});

export const StationSchema = z.object({
  span: z.number().finite(),
  chord: z.number().finite().nonnegative(),
  twist: z.number().finite().default(0),
  offset: z.number().finite().default(0),
  profile: ProfileRefSchema.default(0),
});

const finite = z.number().finite();

export const WingConfigSchema = z.object({
  span: finite.default(600),
  rootChord: finite.nonnegative().default(160),
  tipChord: finite.nonnegative().default(40),
  stationCount: finite.default(13),
  rootTwist: finite.default(0),
  tipTwist: finite.default(0),
  rootOffset: finite.default(0),
  tipOffset: finite.default(0),
  alignTrailingEdge: z.boolean().default(false),
  sweepRate: finite.default(0),
  rootProfile: ProfileRefSchema.default(0),
  tipProfile: ProfileRefSchema.default(1),
  profileTransition: finite.default(0.6),
  profileBlendWidth: finite.default(0.25),
  maxSegmentLength: finite.default(0),
  dihedral: finite.default(0),
  angleOfAttack: finite.default(0),
  sectionThickness: finite.positive().default(SECTION_THICKNESS),
  mirror: z.boolean().default(true),
  /** Hand-authored table; replaces the synthesised planform when present. */
  stations: z.array(StationSchema).min(2).optional()
    .superRefine((table, ctx) => {
      if (!table) return;
      const i = findSpanOrderViolation(table);
      if (i >= 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i + 1, 'span'],
          message: `Station spans must strictly increase: ${table[i + 1].span} follows ${table[i].span}`,
        });
      }
    }),
});

export type WingConfigInput = z.input<typeof WingConfigSchema>;
export type WingConfig = z.output<typeof WingConfigSchema>;

export function parseWingConfig(input: unknown = {}): WingConfig {
  return WingConfigSchema.parse(input);
}

/** The hand-authored table if configured, else the elliptical planform. */
export function buildStationTable(config: WingConfig): StationTable {
  if (config.stations) return config.stations;
  return synthesizeEllipticalPlanform(config);
}

export interface WingBuild extends WingAssembly {
  config: WingConfig;
  stations: readonly Station[];
}

export function buildWing(config: WingConfig): WingBuild {
  const stations = buildStationTable(config);
  const assembly = assembleWing(stations, {
    dihedral: config.dihedral,
    angleOfAttack: config.angleOfAttack,
    sectionThickness: config.sectionThickness,
    mirror: config.mirror,
  });
  return { config, stations, ...assembly };
}
