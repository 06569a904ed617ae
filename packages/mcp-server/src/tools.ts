/**
 * MCP Tool Registrations — the wing pipeline as callable tools.
 *
 * Every tool returns JSON text. Builds answer with
 * { build_id, type, readback } so the caller always knows the current state.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  WingConfigSchema, buildWing, synthesizeEllipticalPlanform, planSpanPositions,
  listProfiles, describeProfileRef,
  parseProfileText, formatProfileSource, readProfileSource,
  type StationTable,
} from '@wingloft/wing';
import * as registry from './registry.js';
import { WING_PARTS, exportDir, writeStl } from './export.js';
import { log } from './log.js';
import { assertStationBudget } from './limits.js';

function reply(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

function stationRows(stations: StationTable) {
  return stations.map(s => ({
    span: s.span,
    chord: s.chord,
    twist: s.twist,
    offset: s.offset,
    profile: describeProfileRef(s.profile),
  }));
}

const PlanformShape = WingConfigSchema.pick({
  span: true,
  rootChord: true,
  tipChord: true,
  stationCount: true,
  rootTwist: true,
  tipTwist: true,
  rootOffset: true,
  tipOffset: true,
  alignTrailingEdge: true,
  sweepRate: true,
  rootProfile: true,
  tipProfile: true,
  profileTransition: true,
  profileBlendWidth: true,
  maxSegmentLength: true,
}).shape;

export function registerTools(server: McpServer): void {

  // ─── Profiles (3) ───────────────────────────────────────────

  server.tool(
    'list_profiles',
    'List the built-in airfoil profiles. Unknown profile ids fall back to id 0.',
    {},
    async () => reply({ profiles: listProfiles() })
  );

  server.tool(
    'convert_profile_text',
    'Parse an airfoil coordinate listing ("x y" per line; # comments, blank and "..." lines skipped). With output_name, also write a profile source file.',
    {
      text: z.string().describe('Coordinate listing'),
      name: z.string().min(1).default('profile').describe('Profile name stored in the source file'),
      output_name: z.string().optional().describe('File name (without extension) to write under the export directory (letters, digits, hyphens, underscores only)'),
    },
    async ({ text, name, output_name }) => {
      const points = parseProfileText(text);
      let filePath: string | undefined;
      if (output_name !== undefined) {
        registry.validateName(output_name, 'output');
        const dir = exportDir();
        fs.mkdirSync(dir, { recursive: true });
        filePath = path.join(dir, `${output_name}.json`);
        fs.writeFileSync(filePath, formatProfileSource(name, points), 'utf-8');
        log(`wrote profile ${name} (${points.length} points) to ${filePath}`);
      }
      return reply({ name, point_count: points.length, points, file_path: filePath });
    }
  );

  server.tool(
    'load_profile_file',
    'Read a profile source file ({ name, points }) and return its points for use as an inline profile.',
    {
      file_path: z.string().describe('Path to a profile source JSON file'),
    },
    async ({ file_path }) => {
      const source = readProfileSource(file_path);
      return reply({
        ...source,
        point_count: source.points.length,
        profile_ref: { kind: 'inline', points: source.points },
      });
    }
  );

  // ─── Planning (2) ───────────────────────────────────────────

  server.tool(
    'plan_span_positions',
    'Spanwise station positions from root (0) to tip (span): uniform, then split so no gap exceeds max_segment_length.',
    {
      span: z.number().finite().describe('Half-span in mm'),
      station_count: z.number().finite().describe('Uniform station count (truncated, at least 2 are used)'),
      max_segment_length: z.number().finite().default(0).describe('Largest gap in mm; 0 or less disables refinement'),
    },
    async ({ span, station_count, max_segment_length }) => {
      assertStationBudget(span, station_count, max_segment_length);
      const positions = planSpanPositions(span, station_count, max_segment_length);
      return reply({ count: positions.length, positions });
    }
  );

  server.tool(
    'synthesize_planform',
    'Elliptical planform station table: chord, twist, offset and profile at every planned span position. Nothing is stored.',
    PlanformShape,
    async (params) => {
      assertStationBudget(params.span, params.stationCount, params.maxSegmentLength);
      const stations = synthesizeEllipticalPlanform(params);
      return reply({ count: stations.length, stations: stationRows(stations) });
    }
  );

  // ─── Builds (4) ─────────────────────────────────────────────

  server.tool(
    'build_wing',
    'Build a wing: elliptical planform (or the given stations table), one convex panel per station pair, dihedral, mirror and angle of attack. Dimensions in mm, angles in degrees. Every field is optional.',
    {
      ...WingConfigSchema.shape,
      name: z.string().optional().describe('Optional name for the build (letters, digits, hyphens, underscores only)'),
    },
    async ({ name, ...config }) => {
      if (!config.stations) {
        assertStationBudget(config.span, config.stationCount, config.maxSegmentLength);
      }
      const start = Date.now();
      const build = buildWing(config);
      const result = registry.create(build, name);
      log(`built ${result.build_id}: ${result.panel_count} panels, ${result.triangle_count} triangles in ${Date.now() - start}ms`);
      return reply(result);
    }
  );

  server.tool(
    'list_builds',
    'List all stored wing builds with their readbacks.',
    {},
    async () => reply({ builds: registry.list() })
  );

  server.tool(
    'get_build',
    'Readback, configuration and station table of one build.',
    {
      build: z.string().describe('Build ID'),
    },
    async ({ build }) => {
      const entry = registry.get(build);
      return reply({
        ...registry.readback(entry.id),
        config: entry.build.config,
        stations: stationRows(entry.build.stations),
      });
    }
  );

  server.tool(
    'delete_build',
    'Remove a build from the registry.',
    {
      build: z.string().describe('Build ID'),
    },
    async ({ build }) => {
      registry.remove(build);
      return reply({ deleted: build, remaining: registry.list().map(b => b.build_id) });
    }
  );

  // ─── Export (1) ─────────────────────────────────────────────

  server.tool(
    'export_stl',
    'Write one part of a build as an STL file under $TMPDIR/wingloft. Parts: wing (both halves, posed), right, left, half (unposed).',
    {
      build: z.string().describe('Build ID'),
      part: z.enum(WING_PARTS).default('wing').describe('Which solid to export'),
      format: z.enum(['binary', 'ascii']).default('binary').describe('STL flavour'),
    },
    async ({ build, part, format }) => {
      const result = writeStl(registry.get(build), part, format);
      log(`exported ${result.build_id}/${part} to ${result.file_path}`);
      return reply(result);
    }
  );
}
