import { formatSiteLogDate } from './dates.js';
import { currentAntenna, currentReceiver, stationId } from './parseSiteLog.js';
import type { SiteLogRecord } from './types.js';

export interface SiteLogSummary {
  station_id: string;
  site_name: string;
  domes_number: string;
  country: string;
  date_prepared: string | null;
  receivers: number;
  antennas: number;
  current_receiver: string | null;
  current_antenna: string | null;
  warnings: number;
  source_file: string;
}

export function summarizeRecord(record: SiteLogRecord): SiteLogSummary {
  const receiver = currentReceiver(record);
  const antenna = currentAntenna(record);
  return {
    station_id: stationId(record),
    site_name: record.site_identification.site_name,
    domes_number: record.site_identification.iers_domes_number,
    country: record.site_location.country,
    date_prepared: record.form.date_prepared ? formatSiteLogDate(record.form.date_prepared) : null,
    receivers: record.receivers.length,
    antennas: record.antennas.length,
    current_receiver: receiver ? receiver.receiver_type : null,
    current_antenna: antenna ? antenna.antenna_type : null,
    warnings: record.warnings.length,
    source_file: record.source_file,
  };
}

const CSV_COLUMNS = [
  'station_id',
  'site_name',
  'domes_number',
  'country',
  'receivers',
  'antennas',
  'current_receiver',
  'current_antenna',
] as const;

function csvCell(value: string | number | null): string {
  const text = value === null ? '' : String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function summariesToCsv(summaries: readonly SiteLogSummary[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const summary of summaries) {
    lines.push(CSV_COLUMNS.map(column => csvCell(summary[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/** Fixed-width overview, one line per station. */
export function summariesToTable(summaries: readonly SiteLogSummary[]): string {
  const row = (id: string, name: string, domes: string, rx: string, ant: string): string =>
    `${id.padEnd(8)}${name.slice(0, 30).padEnd(32)}${domes.padEnd(12)}${rx.padStart(4)}${ant.padStart(5)}`;
  const lines = [
    row('Station', 'Name', 'DOMES', 'Rx', 'Ant').trimEnd(),
    '-'.repeat(61),
    ...summaries.map(s => row(s.station_id, s.site_name, s.domes_number, String(s.receivers), String(s.antennas))),
  ];
  return `${lines.join('\n')}\n`;
}
