import * as path from 'path';
import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import {
  GNSS_SITELOG_DIR_ENV,
  getSiteLogDirFromEnv,
  getToolModeFromEnv,
  requireSiteLogDir,
  type ToolExposureMode,
} from '../config.js';
import {
  FAR_FUTURE_MS,
  STA_INFO,
  STA_NORMALIZE_DATE,
  STA_PARSE_DIRECTORY,
  STA_PARSE_SITE_LOG,
  STA_STATION_EVENTS,
  STA_WRITE_FILE,
  isOpenEnded,
} from '../constants.js';
import { errorMessage, invalidParams, notFound } from '../shared/index.js';
import { formatSiteLogDate, normalizeSiteLogDate } from '../sitelog/dates.js';
import { parseSiteLogDirectory, parseSiteLogFile, stationId } from '../sitelog/parseSiteLog.js';
import { reconcileStationEvents, type StaEvent } from '../sitelog/reconcile.js';
import { summarizeRecord } from '../sitelog/summary.js';
import type { SiteLogRecord } from '../sitelog/types.js';
import {
  DEFAULT_STA_REMARK,
  DEFAULT_STA_TITLE,
  renderType002Row,
  writeStaFile,
} from '../sta/staWriter.js';
import { getPackageVersion } from '../version.js';

export type { ToolExposureMode };
export type ToolExposure = 'standard' | 'full';

export interface ToolHandlerContext {}

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler(params: z.output<TSchema>, ctx: ToolHandlerContext): Promise<unknown>;
}

/** Identity; lets each entry of TOOL_SPECS infer its own parameter type. */
function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec<TSchema> {
  return spec;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

// ── Helpers ───────────────────────────────────────────────────────────────

function loadStationRecord(params: { path?: string; directory?: string; station?: string }): SiteLogRecord {
  if (params.path) return parseSiteLogFile(params.path);

  const station = params.station?.trim().toLowerCase() ?? '';
  const directory = requireSiteLogDir(params.directory);
  const { records } = parseSiteLogDirectory(directory, { stations: [station] });
  const record = records.get(station);
  if (!record) {
    throw notFound(`No site log for station ${station.toUpperCase()} in ${directory}`, { directory, station });
  }
  return record;
}

function eventToJson(name: string, event: StaEvent): Record<string, unknown> {
  return {
    from: formatSiteLogDate(event.start),
    to: isOpenEnded(event.end) ? null : formatSiteLogDate(event.end),
    receiver_type: event.receiver_type,
    receiver_serial: event.receiver_serial,
    antenna_type: event.antenna_type,
    antenna_serial: event.antenna_serial,
    radome_type: event.radome_type,
    north_ecc: event.north_ecc,
    east_ecc: event.east_ecc,
    up_ecc: event.up_ecc,
    site_name: event.site_name,
    sta_row: renderType002Row(name, event, DEFAULT_STA_REMARK),
  };
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const StaInfoSchema = z.object({});

const StaParseSiteLogSchema = z.object({
  path: z.string().min(1).describe('Path to an IGS site log (.log) file'),
});

const StaParseDirectorySchema = z.object({
  directory: z.string().min(1).optional()
    .describe(`Directory of site logs; defaults to $${GNSS_SITELOG_DIR_ENV}`),
  stations: z.array(z.string().min(1)).optional()
    .describe('4-character station IDs to keep (case-insensitive)'),
});

const StaStationEventsSchema = z.object({
  path: z.string().min(1).optional().describe('Path to a single site log'),
  directory: z.string().min(1).optional()
    .describe(`Directory of site logs; defaults to $${GNSS_SITELOG_DIR_ENV}`),
  station: z.string().min(1).optional().describe('4-character station ID (with directory)'),
}).refine(
  v => v.path !== undefined || v.station !== undefined,
  { message: 'Either path or station must be provided' },
);

const StaWriteFileSchema = z.object({
  output: z.string().min(1).describe('Path of the .STA file to write'),
  directory: z.string().min(1).optional()
    .describe(`Directory of site logs; defaults to $${GNSS_SITELOG_DIR_ENV}`),
  stations: z.array(z.string().min(1)).optional().describe('Restrict to these station IDs'),
  use_domes: z.boolean().optional().describe('Write station names as "ABCD 12345M001"'),
  title: z.string().max(63).optional().describe('Title line of the file'),
  remark: z.string().max(24).optional().describe('REMARK column text'),
});

const StaNormalizeDateSchema = z.object({
  value: z.string().describe('Raw date text as found in a site log'),
});

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: STA_INFO,
    description: 'Server version, tool mode, configured site log directory and STA output defaults.',
    exposure: 'standard',
    zodSchema: StaInfoSchema,
    handler: async () => {
      let siteLogDir: string | null = null;
      let siteLogDirError: string | null = null;
      try {
        siteLogDir = getSiteLogDirFromEnv() ?? null;
      } catch (err) {
        siteLogDirError = errorMessage(err);
      }
      return {
        server: 'gnss-sta-mcp',
        version: getPackageVersion(),
        tool_mode: getToolModeFromEnv(),
        sitelog_dir: siteLogDir,
        ...(siteLogDirError ? { sitelog_dir_error: siteLogDirError } : {}),
        sta_defaults: {
          title: DEFAULT_STA_TITLE,
          remark: DEFAULT_STA_REMARK,
          open_end: formatSiteLogDate(new Date(FAR_FUTURE_MS)),
        },
      };
    },
  }),
  defineTool({
    name: STA_PARSE_SITE_LOG,
    description: 'Parse one IGS site log into a structured record (all sections, reconciled equipment history, warnings).',
    exposure: 'standard',
    zodSchema: StaParseSiteLogSchema,
    handler: async (params) => parseSiteLogFile(params.path),
  }),
  defineTool({
    name: STA_PARSE_DIRECTORY,
    description: 'Parse every *.log file in a directory; returns a per-station summary plus files that failed.',
    exposure: 'standard',
    zodSchema: StaParseDirectorySchema,
    handler: async (params) => {
      const directory = requireSiteLogDir(params.directory);
      const result = parseSiteLogDirectory(directory, { stations: params.stations });
      const stations = [...result.records.values()]
        .map(summarizeRecord)
        .sort((a, b) => a.station_id.localeCompare(b.station_id));
      return {
        directory: result.directory,
        station_count: stations.length,
        stations,
        failures: result.failures,
        skipped: result.skipped.map(file => path.basename(file)),
      };
    },
  }),
  defineTool({
    name: STA_STATION_EVENTS,
    description: 'Reconciled receiver+antenna periods for one station, as they would be written to TYPE 002 of the STA file.',
    exposure: 'standard',
    zodSchema: StaStationEventsSchema,
    handler: async (params) => {
      const record = loadStationRecord(params);
      const id = stationId(record);
      if (!id) throw invalidParams('Site log has no station ID', { source_file: record.source_file });
      const { items, warnings } = reconcileStationEvents(record);
      return {
        station_id: id,
        source_file: record.source_file,
        event_count: items.length,
        events: items.map(event => eventToJson(id, event)),
        warnings: [...record.warnings, ...warnings],
      };
    },
  }),
  defineTool({
    name: STA_WRITE_FILE,
    description: 'Parse a site log directory and write a Bernese station information (.STA) file.',
    exposure: 'standard',
    zodSchema: StaWriteFileSchema,
    handler: async (params) => {
      const directory = requireSiteLogDir(params.directory);
      const parsed = parseSiteLogDirectory(directory, { stations: params.stations });
      const written = writeStaFile(params.output, parsed.records.values(), {
        title: params.title,
        remark: params.remark,
        useDomes: params.use_domes,
      });
      return {
        output: written.path,
        stations_written: written.stations,
        logs_parsed: parsed.records.size,
        failures: parsed.failures,
      };
    },
  }),
  defineTool({
    name: STA_NORMALIZE_DATE,
    description: 'Normalise a raw site log date string to ISO-8601 UTC (null when unrecognised).',
    exposure: 'full',
    zodSchema: StaNormalizeDateSchema,
    handler: async (params) => {
      const date = normalizeSiteLogDate(params.value);
      return { input: params.value, normalized: date ? formatSiteLogDate(date) : null };
    },
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
