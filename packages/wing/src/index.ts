// Profiles
export type { Point2, Profile, ProfileRef, ProfileInfo } from './profile.js';
export {
  profileById, inlineProfile, resolveProfile, fallbackProfileId,
  isBuiltinProfileId, listProfiles, describeProfileRef, DEFAULT_PROFILE_ID,
} from './profile.js';
export { blendProfiles, clamp01 } from './blend.js';

// Profile sources
export type { ProfileSource } from './profile-source.js';
export {
  PointSchema, ProfileSourceSchema,
  parseProfileText, formatProfileSource, readProfileSource, convertProfileFile,
} from './profile-source.js';

// Stations
export type { Station, StationTable } from './station.js';
export { station, findSpanOrderViolation } from './station.js';
export { planSpanPositions } from './span.js';
export type { PlanformParams } from './planform.js';
export { synthesizeEllipticalPlanform, ellipticalChord, profileMixAt } from './planform.js';

// Geometry
export { placeSection, placeStation, SECTION_THICKNESS } from './section.js';
export { loftPanel } from './panel.js';
export type { WingOptions, WingAssembly } from './assembler.js';
export { assembleWing, DEFAULT_WING_OPTIONS } from './assembler.js';

// Configuration
export type { WingConfig, WingConfigInput, WingBuild } from './config.js';
export {
  WingConfigSchema, StationSchema, ProfileRefSchema,
  parseWingConfig, buildStationTable, buildWing,
} from './config.js';
