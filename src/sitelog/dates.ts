/**
 * Free-text date normalisation for IGS site logs.
 *
 * The template asks for CCYY-MM-DDThh:mmZ, but 25 years of hand-edited logs
 * contain every variation around it: local zone markers (TU, UT, GMT), spaces
 * instead of T, month names, slashes, missing hours. Input is rewritten step
 * by step towards one of a few accepted shapes and then range-checked.
 *
 * All timestamps are UTC. Anything unrecognised yields null, never an error.
 */

import { logDebug } from '../shared/index.js';

const MONTH_ABBREVIATIONS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const BARE_TIME_RE = /^T?\d{1,2}:\d{2}(?::\d{2})?Z?$/;

const ISO_NO_ZONE_RE = /^\d{4}-\d{1,2}-\d{1,2}T\d{1,2}:\d{2}(?::\d{2})?$/;
const ISO_SPACE_TIME_RE = /^(\d{4}-\d{1,2}-\d{1,2})\s+(\d{1,2}:\d{2}(?::\d{2})?)$/;
const DAY_MONTH_NAME_RE = /^(\d{1,2})[-\s]([A-Za-z]{3})[-\s](\d{4})$/;
const MONTH_NAME_DAY_RE = /^([A-Za-z]{3})[-\s](\d{1,2})[-\s](\d{4})$/;
const DATE_ONLY_RE = /^\d{4}-\d{1,2}-\d{1,2}$/;

// Accepted final shapes.
const ISO_UTC_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?Z$/;
const SLASH_YMD_RE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const SLASH_DMY_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

export function utcDate(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls 2021-02-30 over into March; reject instead.
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

function isPlaceholderDate(value: string): boolean {
  if (value.includes('CCYY')) return true;
  if (value === '0000-00-00') return true;
  return value.startsWith('(') && value.endsWith(')');
}

function monthNumber(name: string): number | undefined {
  return MONTH_ABBREVIATIONS[name.toLowerCase()];
}

function pad2(n: number | string): string {
  return String(n).padStart(2, '0');
}

/** Rewrites the known variants towards CCYY-MM-DDThh:mm[:ss]Z. */
function rewriteDateString(input: string): string {
  let s = input;

  s = s.replace(/\)$/, '');
  s = s.replace(/Z+$/, 'Z');

  // Temps Universel / Universal Time markers
  s = s.replace(/\s*UTC\s*$/, 'Z');
  s = s.replace(/\s*TU\s*$/, 'Z');
  s = s.replace(/\s*UT\s*$/, 'Z');
  // "2020-03-01 12:30 GMT" → "2020-03-01 12:30", promoted to UTC below
  s = s.replace(/\s*GMT\s*$/i, '');

  // "2020-03-01T:30" has lost its hour
  s = s.replace(/T:(\d{2})/, 'T00:$1');

  s = s.replace(/\s+T/g, 'T');
  s = s.replace(/T\s+/g, 'T');

  if (ISO_NO_ZONE_RE.test(s)) return `${s}Z`;

  const spaced = ISO_SPACE_TIME_RE.exec(s);
  if (spaced) return `${spaced[1]}T${spaced[2]}Z`;

  const dayFirst = DAY_MONTH_NAME_RE.exec(s);
  if (dayFirst) {
    const month = monthNumber(dayFirst[2] ?? '');
    if (month !== undefined) return `${dayFirst[3]}-${pad2(month)}-${pad2(dayFirst[1] ?? '')}T00:00Z`;
  }

  const monthFirst = MONTH_NAME_DAY_RE.exec(s);
  if (monthFirst) {
    const month = monthNumber(monthFirst[1] ?? '');
    if (month !== undefined) return `${monthFirst[3]}-${pad2(month)}-${pad2(monthFirst[2] ?? '')}T00:00Z`;
  }

  if (DATE_ONLY_RE.test(s)) return `${s}T00:00Z`;

  return s;
}

function toInt(value: string | undefined): number {
  return value === undefined ? 0 : parseInt(value, 10);
}

function matchAcceptedShape(s: string): Date | null | undefined {
  const iso = ISO_UTC_RE.exec(s);
  if (iso) {
    return utcDate(toInt(iso[1]), toInt(iso[2]), toInt(iso[3]), toInt(iso[4]), toInt(iso[5]), toInt(iso[6]));
  }

  const ymd = SLASH_YMD_RE.exec(s);
  if (ymd) {
    return utcDate(toInt(ymd[1]), toInt(ymd[2]), toInt(ymd[3]), toInt(ymd[4]), toInt(ymd[5]), toInt(ymd[6]));
  }

  const dmy = SLASH_DMY_RE.exec(s);
  if (dmy) {
    return utcDate(toInt(dmy[3]), toInt(dmy[2]), toInt(dmy[1]));
  }

  return undefined;
}

/**
 * Parses a site-log date field. Date-only values become midnight UTC; values
 * without a zone are taken as UTC. Returns null for blanks, template text,
 * bare times of day and anything unrecognised.
 */
export function normalizeSiteLogDate(raw: string): Date | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return null;
  if (isPlaceholderDate(trimmed)) return null;
  if (BARE_TIME_RE.test(trimmed)) return null;

  const rewritten = rewriteDateString(trimmed);
  const result = matchAcceptedShape(rewritten);
  if (result === undefined) {
    logDebug(`Could not parse date: ${trimmed}`);
    return null;
  }
  if (result === null) {
    logDebug(`Date out of range: ${trimmed}`);
  }
  return result;
}

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/** CCYY-MM-DDThh:mm:ssZ */
export function formatSiteLogDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
