import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { runStaCli, type CliIo } from '../src/cli/staCli.js';
import { DEFAULT_STA_TITLE } from '../src/sta/staWriter.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/sitelogs/tsta00tst_20240115.log', import.meta.url));

function captureIo(): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: text => out.push(text),
    stderr: text => err.push(text),
  };
}

describe('sta CLI', () => {
  const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'gnss-sta-cli-'));
  const logDir = path.join(tmpRoot, 'logs');
  const emptyDir = path.join(tmpRoot, 'empty');

  beforeAll(() => {
    fs.mkdirSync(logDir);
    fs.mkdirSync(emptyDir);
    fs.copyFileSync(FIXTURE, path.join(logDir, 'tsta00tst_20240115.log'));
  });

  afterAll(() => {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  });

  it('parse --format csv prints one row per station', () => {
    const io = captureIo();
    expect(runStaCli(['parse', logDir, '--format', 'csv'], io)).toBe(0);
    expect(io.out.join('')).toBe([
      'station_id,site_name,domes_number,country,receivers,antennas,current_receiver,current_antenna',
      `TSTA,Test Station Alpha,99901M001,France,2,2,SEPT POLARX5,${'LEIAR25.R4'.padEnd(16)}LEIT`,
      '',
    ].join('\n'));
    expect(io.err).toContain('[gnss-sta] Parsed 1 stations (0 failures)\n');
  });

  it('parse --station prints the station detail', () => {
    const io = captureIo();
    expect(runStaCli(['parse', logDir, '--station', 'tsta'], io)).toBe(0);
    const lines = io.out.join('').split('\n');
    expect(lines.slice(0, 4)).toEqual([
      'Station:  TSTA',
      'Name:     Test Station Alpha',
      'DOMES:    99901M001',
      'Country:  France',
    ]);
    expect(lines).toContain('Receivers (2):');
    expect(lines).toContain('Antennas (2):');
  });

  it('parse --station reports an unknown station', () => {
    const io = captureIo();
    expect(runStaCli(['parse', logDir, '--station', 'zzzz'], io)).toBe(1);
    expect(io.err).toEqual(['[gnss-sta] Station not found: zzzz\n']);
  });

  it('build writes the STA file', () => {
    const io = captureIo();
    const output = path.join(tmpRoot, 'out', 'STATIONS.STA');
    expect(runStaCli(['build', logDir, '--output', output], io)).toBe(0);
    expect(io.out).toEqual([`Wrote 1 stations to ${output}\n`]);
    const content = fs.readFileSync(output, 'utf-8');
    expect(content.startsWith(DEFAULT_STA_TITLE)).toBe(true);
    expect(content.split('\n').filter(line => line.startsWith('TSTA '))).toHaveLength(4);
  });

  it('build exits 1 when no station could be written', () => {
    const io = captureIo();
    const output = path.join(tmpRoot, 'empty.STA');
    expect(runStaCli(['build', emptyDir, '-o', output], io)).toBe(1);
    expect(io.err).toEqual(['[gnss-sta] No stations written\n']);
    expect(fs.existsSync(output)).toBe(false);
  });

  it('build without --output is a usage error', () => {
    const io = captureIo();
    expect(runStaCli(['build', logDir], io)).toBe(2);
    expect(io.err[0]?.startsWith('Missing --output for build\n')).toBe(true);
  });

  it('rejects unknown arguments', () => {
    const io = captureIo();
    expect(runStaCli(['parse', '--bogus'], io)).toBe(2);
    expect(io.err[0]?.startsWith('Unknown arg: --bogus\nUsage:')).toBe(true);
  });

  it('prints usage for --help', () => {
    const io = captureIo();
    expect(runStaCli(['--help'], io)).toBe(0);
    expect(io.err[0]?.startsWith('Usage:')).toBe(true);
  });
});
