/**
 * Text normalisation for values pulled out of IGS site logs.
 *
 * Site logs are maintained by hand at hundreds of agencies and carry encoding
 * debris (Latin-1 accents, degree signs, mangled place names) plus the hint
 * text of the blank template. Everything extracted from a log goes through
 * cleanValue() before it reaches a record.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';

// ── Character tables ──────────────────────────────────────────────────────

let diacriticTable: Map<string, string> | null = null;

function loadDiacriticTable(): Map<string, string> {
  if (diacriticTable) return diacriticTable;
  const tablePath = fileURLToPath(new URL('../../data/diacritics.json', import.meta.url));
  const parsed: unknown = JSON.parse(fs.readFileSync(tablePath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Diacritic table is not a JSON object: ${tablePath}`);
  }
  const table = new Map<string, string>();
  for (const [from, to] of Object.entries(parsed)) {
    if (typeof to === 'string') table.set(from, to);
  }
  diacriticTable = table;
  return table;
}

const SYMBOL_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['°', ' deg '],
  ['±', ''],
  ['º', ' deg '],
  ['′', "'"],
  ['″', '"'],
];

// First match wins; the whole value is replaced by the canonical spelling.
const PLACE_NAME_CORRECTIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/^Finist/, 'Finistere'],
  [/^Pont-de-Buis/i, 'Pont-de-Buis-les-Quirmech'],
  [/^Tup./i, 'Tupa'],
  [/^S.o\s*Lu[ií]s/i, 'Sao Luis'],
  [/^Concepci/i, 'Concepcion'],
  [/^Bogot/i, 'Bogota'],
  [/^Bras.lia/i, 'Brasilia'],
];

const TEMPLATE_PLACEHOLDERS = new Set([
  '(multiple lines)',
  'CCYY-MM-DDThh:mmZ',
  '(A4)',
  '(A9)',
  '(CCYY)',
  '(DDD)',
  '(sec)',
  '(m)',
  '(deg)',
  '(+/- m)',
  '(see instructions in header)',
]);

// ── Cleaning ──────────────────────────────────────────────────────────────

export function foldDiacritics(value: string): string {
  const table = loadDiacriticTable();
  let out = '';
  for (const ch of value) out += table.get(ch) ?? ch;
  return out;
}

export function correctPlaceName(value: string): string {
  for (const [pattern, replacement] of PLACE_NAME_CORRECTIONS) {
    if (pattern.test(value)) return replacement;
  }
  return value;
}

export function isTemplatePlaceholder(value: string): boolean {
  return TEMPLATE_PLACEHOLDERS.has(value.trim());
}

export function cleanValue(raw: string): string {
  if (!raw) return '';

  let value = foldDiacritics(raw);
  for (const [from, to] of SYMBOL_REPLACEMENTS) {
    value = value.split(from).join(to);
  }
  value = correctPlaceName(value);

  if (isTemplatePlaceholder(value)) return '';
  return value.trim();
}

// ── Numeric fields ────────────────────────────────────────────────────────

const NUMBER_TOKEN_RE = /[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/;

/** First numeric token of the value; 0 when there is none (blank eccentricities mean zero). */
export function parseNumericField(raw: string): number {
  const match = NUMBER_TOKEN_RE.exec(raw);
  if (!match) return 0;
  const n = Number(match[0]);
  return Number.isFinite(n) ? n : 0;
}

/**
 * Site-log latitude/longitude: ±DDMMSS.SS or ±DDDMMSS.SS.
 * Returns decimal degrees, or null when the field is not in that shape.
 */
export function parseSiteLogAngle(raw: string): number | null {
  const match = /^([+-]?)(\d{5,7})(\.\d+)?$/.exec(raw.replace(/\s+/g, ''));
  if (!match) return null;
  const sign = match[1] === '-' ? -1 : 1;
  const digits = match[2] ?? '';
  const fraction = match[3] ?? '';

  const degrees = Number(digits.slice(0, -4));
  const minutes = Number(digits.slice(-4, -2));
  const seconds = Number(digits.slice(-2) + fraction);
  if (minutes >= 60 || seconds >= 60) return null;

  return sign * (degrees + minutes / 60 + seconds / 3600);
}
