import { LOG_PREFIX, errorMessage } from '../shared/index.js';
import { requireSiteLogDir } from '../config.js';
import { formatSiteLogDate } from '../sitelog/dates.js';
import { parseSiteLogDirectory, type DirectoryParseResult } from '../sitelog/parseSiteLog.js';
import { summarizeRecord, summariesToCsv, summariesToTable } from '../sitelog/summary.js';
import type { SiteLogRecord } from '../sitelog/types.js';
import { writeStaFile } from '../sta/staWriter.js';

type OutputFormat = 'summary' | 'json' | 'csv';

interface StaCliArgs {
  command: 'parse' | 'build';
  directory?: string;
  format: OutputFormat;
  station?: string;
  stations?: string[];
  output?: string;
  useDomes: boolean;
  title?: string;
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIo: CliIo = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

function usage(): string {
  return [
    'Usage:',
    '  gnss-sta-mcp sta parse [<dir>] [--format summary|json|csv] [--station ID] [--output FILE.STA] [--use-domes] [--title T]',
    '  gnss-sta-mcp sta build [<dir>] --output FILE.STA [--stations a,b,c] [--use-domes] [--title T]',
    '',
    '<dir> defaults to $GNSS_SITELOG_DIR.',
  ].join('\n');
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

function parseFormat(value: string): OutputFormat {
  if (value === 'summary' || value === 'json' || value === 'csv') return value;
  throw new Error(`Unknown format: ${value}`);
}

function parseArgs(argv: string[]): StaCliArgs {
  const [command, ...rest] = argv;
  if (command === '--help' || command === '-h') throw new Error('help');
  if (command !== 'parse' && command !== 'build') {
    throw new Error(command ? `Unknown command: ${command}` : 'Missing command');
  }

  const out: StaCliArgs = { command, format: 'summary', useDomes: false };
  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index] ?? '';
    if (arg === '--format') out.format = parseFormat(requireValue(arg, rest[++index]));
    else if (arg === '--station') out.station = requireValue(arg, rest[++index]);
    else if (arg === '--stations') {
      out.stations = requireValue(arg, rest[++index]).split(',').map(s => s.trim()).filter(s => s.length > 0);
    } else if (arg === '--output' || arg === '-o') out.output = requireValue(arg, rest[++index]);
    else if (arg === '--use-domes') out.useDomes = true;
    else if (arg === '--title') out.title = requireValue(arg, rest[++index]);
    else if (arg === '--help' || arg === '-h') throw new Error('help');
    else if (arg.startsWith('-')) throw new Error(`Unknown arg: ${arg}`);
    else if (out.directory === undefined) out.directory = arg;
    else throw new Error(`Unexpected argument: ${arg}`);
  }
  return out;
}

// Parse failures are already logged by parseSiteLogDirectory.
function reportSkipped(result: DirectoryParseResult, io: CliIo): void {
  for (const file of result.skipped) {
    io.stderr(`${LOG_PREFIX} Skipped (no station ID): ${file}\n`);
  }
}

function describeDate(date: Date | null): string {
  return date ? formatSiteLogDate(date) : 'present';
}

export function formatStationDetail(record: SiteLogRecord): string {
  const summary = summarizeRecord(record);
  const lines = [
    `Station:  ${summary.station_id}`,
    `Name:     ${summary.site_name}`,
    `DOMES:    ${summary.domes_number}`,
    `Country:  ${summary.country}`,
    `Source:   ${summary.source_file}`,
    '',
    `Receivers (${record.receivers.length}):`,
    ...record.receivers.map(r =>
      `  ${r.receiver_type.padEnd(20)}  ${r.serial_number.padEnd(20)}  `
      + `${formatSiteLogDate(r.date_installed)} - ${describeDate(r.date_removed)}`),
    '',
    `Antennas (${record.antennas.length}):`,
    ...record.antennas.map(a =>
      `  ${a.antenna_type.padEnd(20)}  ${a.radome_type.padEnd(4)}  ${a.serial_number.padEnd(20)}  `
      + `${formatSiteLogDate(a.date_installed)} - ${describeDate(a.date_removed)}`),
  ];
  if (record.warnings.length > 0) {
    lines.push('', `Warnings (${record.warnings.length}):`, ...record.warnings.map(w => `  ${w}`));
  }
  return `${lines.join('\n')}\n`;
}

function runParse(args: StaCliArgs, result: DirectoryParseResult, io: CliIo): number {
  const records = [...result.records.values()];

  if (args.station !== undefined) {
    const record = result.records.get(args.station.trim().toLowerCase());
    if (!record) {
      io.stderr(`${LOG_PREFIX} Station not found: ${args.station}\n`);
      return 1;
    }
    io.stdout(args.format === 'json'
      ? `${JSON.stringify(record, null, 2)}\n`
      : formatStationDetail(record));
    return 0;
  }

  const summaries = records
    .map(summarizeRecord)
    .sort((a, b) => a.station_id.localeCompare(b.station_id));

  if (args.format === 'json') io.stdout(`${JSON.stringify(summaries, null, 2)}\n`);
  else if (args.format === 'csv') io.stdout(summariesToCsv(summaries));
  else io.stdout(summariesToTable(summaries));

  io.stderr(`${LOG_PREFIX} Parsed ${records.length} stations (${result.failures.length} failures)\n`);

  if (args.output !== undefined) {
    const written = writeStaFile(args.output, records, { title: args.title, useDomes: args.useDomes });
    io.stderr(`${LOG_PREFIX} Wrote ${written.stations} stations to ${written.path}\n`);
  }
  return 0;
}

function runBuild(args: StaCliArgs, result: DirectoryParseResult, io: CliIo): number {
  if (args.output === undefined) {
    io.stderr(`Missing --output for build\n${usage()}\n`);
    return 2;
  }
  const written = writeStaFile(args.output, result.records.values(), {
    title: args.title,
    useDomes: args.useDomes,
  });
  if (written.stations === 0) {
    io.stderr(`${LOG_PREFIX} No stations written\n`);
    return 1;
  }
  io.stdout(`Wrote ${written.stations} stations to ${written.path}\n`);
  return 0;
}

/**
 * `sta` subcommand. Returns the process exit code: 0 on success, 1 when
 * nothing usable came out, 2 on bad arguments.
 */
export function runStaCli(argv: string[], io: CliIo = defaultIo): number {
  let args: StaCliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    const message = errorMessage(err);
    if (message === 'help') {
      io.stderr(`${usage()}\n`);
      return 0;
    }
    io.stderr(`${message}\n${usage()}\n`);
    return 2;
  }

  try {
    const directory = requireSiteLogDir(args.directory);
    const stations = args.command === 'build' ? args.stations : undefined;
    const result = parseSiteLogDirectory(directory, { stations });
    reportSkipped(result, io);

    return args.command === 'build' ? runBuild(args, result, io) : runParse(args, result, io);
  } catch (err) {
    io.stderr(`${LOG_PREFIX} ${errorMessage(err)}\n`);
    return 1;
  }
}
