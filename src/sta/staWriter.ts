/**
 * Bernese station information (.STA) file writer.
 *
 * Layout is positional: every header, ruler and row below is reproduced column
 * for column. TYPE 001 lists each station once; TYPE 002 has one row per
 * equipment event; TYPE 003-005 are written with headers only.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LOG_PREFIX, errorMessage, ioError } from '../shared/index.js';
import { reconcileStationEvents, type StaEvent } from '../sitelog/reconcile.js';
import { stationId } from '../sitelog/parseSiteLog.js';
import type { SiteLogRecord } from '../sitelog/types.js';
import { formatOffset, formatStaEndEpoch, formatStaEpoch, truncateSiteName } from './fields.js';

export const DEFAULT_STA_TITLE = 'STATION INFORMATION FROM IGS SITE LOGS';
export const DEFAULT_STA_REMARK = 'SITE LOG GENERATED';

const TITLE_WIDTH = 63;
const STATION_NAME_WIDTH = 16;
const BLANK_EPOCH = ' '.repeat(19);

export interface StaStation {
  /** Upper-case 4-character ID */
  station_id: string;
  domes_number: string;
  site_name: string;
  events: StaEvent[];
  warnings: string[];
}

export interface StaRenderOptions {
  title?: string;
  remark?: string;
  /** Station names as "ABCD 12345M001" instead of "ABCD" */
  useDomes?: boolean;
  /** Timestamp in the title line; defaults to the current time */
  now?: Date;
}

export interface StaWriteResult {
  path: string;
  stations: number;
}

// ── Stations ──────────────────────────────────────────────────────────────

/** One station per record with a station ID and at least one event, sorted by ID. */
export function buildStaStations(records: Iterable<SiteLogRecord>): StaStation[] {
  const stations: StaStation[] = [];
  for (const record of records) {
    const id = stationId(record);
    if (!id) continue;
    const { items, warnings } = reconcileStationEvents(record);
    if (items.length === 0) continue;
    stations.push({
      station_id: id,
      domes_number: record.site_identification.iers_domes_number,
      site_name: truncateSiteName(record.site_identification.site_name),
      events: items,
      warnings,
    });
  }
  return stations.sort((a, b) => a.station_id.toLowerCase().localeCompare(b.station_id.toLowerCase()));
}

export function staStationName(station: StaStation, useDomes: boolean): string {
  if (!useDomes) return station.station_id;
  return `${station.station_id} ${station.domes_number}`.trim();
}

// ── Rendering ─────────────────────────────────────────────────────────────

function formatTitleTimestamp(now: Date): string {
  const p = (n: number): string => String(n).padStart(2, '0');
  return `${p(now.getUTCDate())}-${p(now.getUTCMonth() + 1)}-${now.getUTCFullYear()} `
    + `${p(now.getUTCHours())}:${p(now.getUTCMinutes())}`;
}

function headerLines(title: string, now: Date): string[] {
  return [
    `${title.slice(0, TITLE_WIDTH).padEnd(TITLE_WIDTH)} ${formatTitleTimestamp(now)}`,
    '-'.repeat(80),
    '',
    'FORMAT VERSION: 1.01',
    'TECHNIQUE:      GNSS',
    '',
  ];
}

export function renderType001Row(station: StaStation, useDomes: boolean, remark: string): string {
  const name = staStationName(station, useDomes);
  const oldName = `${station.station_id.toUpperCase()}*`;
  return `${name.padEnd(STATION_NAME_WIDTH)}      001  `
    + `${BLANK_EPOCH}  `
    + `${BLANK_EPOCH}  `
    + `${oldName.padEnd(STATION_NAME_WIDTH)}      `
    + remark.padEnd(24);
}

export function renderType002Row(name: string, event: StaEvent, remark: string): string {
  return `${name.padEnd(STATION_NAME_WIDTH)}      001  `
    + `${formatStaEpoch(event.start)}  `
    + `${formatStaEndEpoch(event.end)}  `
    + `${event.receiver_type.padEnd(20)}  `
    + `${event.receiver_serial.padStart(20)}  `
    + `${event.receiver_serial.slice(-6).padStart(6)}  `
    + `${event.antenna_type.padEnd(20)}  `
    + `${event.antenna_serial.padStart(20)}  `
    + `${event.antenna_serial.slice(-6).padStart(6)}  `
    + `${formatOffset(event.north_ecc)}  `
    + `${formatOffset(event.east_ecc)}  `
    + `${formatOffset(event.up_ecc)}  `
    + `${event.site_name.padEnd(22)}  `
    + remark;
}

function type001Lines(stations: readonly StaStation[], useDomes: boolean, remark: string): string[] {
  return [
    'TYPE 001: RENAMING OF STATIONS',
    '-'.repeat(30),
    '',
    'STATION NAME          FLG          FROM                   TO         '
      + 'OLD STATION NAME      REMARK',
    '****************      ***  YYYY MM DD HH MM SS  YYYY MM DD HH MM SS  '
      + '****************      ************************',
    ...stations.map(station => renderType001Row(station, useDomes, remark)),
    '',
    '',
  ];
}

function type002Lines(stations: readonly StaStation[], useDomes: boolean, remark: string): string[] {
  const rows: string[] = [];
  for (const station of stations) {
    const name = staStationName(station, useDomes);
    for (const event of station.events) rows.push(renderType002Row(name, event, remark));
  }
  return [
    'TYPE 002: STATION INFORMATION',
    '-'.repeat(29),
    '',
    'STATION NAME          FLG          FROM                   TO         '
      + 'RECEIVER TYPE         RECEIVER SERIAL NBR   REC #   '
      + 'ANTENNA TYPE          ANTENNA SERIAL NBR    ANT #    '
      + 'NORTH      EAST      UP      DESCRIPTION             REMARK',
    '****************      ***  YYYY MM DD HH MM SS  YYYY MM DD HH MM SS  '
      + '********************  ********************  ******  '
      + '********************  ********************  ******  '
      + '***.****  ***.****  ***.****  **********************  ************************',
    ...rows,
    '',
    '',
  ];
}

const TYPE_003_LINES = [
  'TYPE 003: HANDLING OF STATION PROBLEMS',
  '-'.repeat(38),
  '',
  'STATION NAME          FLG          FROM                   TO         REMARK',
  '****************      ***  YYYY MM DD HH MM SS  YYYY MM DD HH MM SS  '
    + '************************************************************',
  '',
  '',
];

const TYPE_004_LINES = [
  'TYPE 004: STATION COORDINATES AND VELOCITIES (ADDNEQ)',
  '-'.repeat(53),
  '                                            RELATIVE CONSTR. POSITION     '
    + 'RELATIVE CONSTR. VELOCITY',
  'STATION NAME 1        STATION NAME 2        NORTH     EAST      UP        '
    + 'NORTH     EAST      UP',
  '****************      ****************      **.*****  **.*****  **.*****  '
    + '**.*****  **.*****  **.*****',
  '',
  '',
];

const TYPE_005_LINES = [
  'TYPE 005: HANDLING STATION TYPES',
  '-'.repeat(32),
  '',
  'STATION NAME          FLG  FROM                 TO                   '
    + 'MARKER TYPE           REMARK',
  '****************      ***  YYYY MM DD HH MM SS  YYYY MM DD HH MM SS  '
    + '********************  ************************',
  '',
  '',
];

export function renderStaFile(stations: readonly StaStation[], options: StaRenderOptions = {}): string {
  const title = options.title ?? DEFAULT_STA_TITLE;
  const remark = options.remark ?? DEFAULT_STA_REMARK;
  const useDomes = options.useDomes ?? false;
  const now = options.now ?? new Date();

  const lines = [
    ...headerLines(title, now),
    ...type001Lines(stations, useDomes, remark),
    ...type002Lines(stations, useDomes, remark),
    ...TYPE_003_LINES,
    ...TYPE_004_LINES,
    ...TYPE_005_LINES,
  ];
  return `${lines.join('\n')}\n`;
}

// ── Files ─────────────────────────────────────────────────────────────────

/**
 * Writes the STA file for the given records. Nothing is written when no record
 * yields a station with events.
 */
export function writeStaFile(
  outputPath: string,
  records: Iterable<SiteLogRecord>,
  options: StaRenderOptions = {},
): StaWriteResult {
  const resolved = path.resolve(outputPath);
  const stations = buildStaStations(records);
  if (stations.length === 0) {
    console.error(`${LOG_PREFIX} No valid stations to write; ${resolved} left untouched`);
    return { path: resolved, stations: 0 };
  }

  const tmpPath = `${resolved}.tmp.${process.pid}`;
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(tmpPath, renderStaFile(stations, options), 'utf-8');
    fs.renameSync(tmpPath, resolved);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw ioError(`Cannot write STA file ${resolved}: ${errorMessage(err)}`, { path: resolved });
  }

  console.error(`${LOG_PREFIX} Wrote STA file with ${stations.length} stations: ${resolved}`);
  return { path: resolved, stations: stations.length };
}
