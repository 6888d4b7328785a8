/**
 * Label-based field extraction over one section block.
 *
 * Site-log fields look like
 *
 *     4.1  Antenna Type             : TRM59800.00     SCIS
 *          Marker->ARP Up Ecc. (m)  : 0.0614
 *          Additional Information   : first line
 *                                   : continuation
 *
 * A label matches at the start of a field (after an optional section number),
 * case-insensitively; whatever follows it up to the first colon (units, dots,
 * padding) is ignored. Labels are regex sources so that "Observed Degr[ae]dations"
 * and escaped parentheses work.
 */

import { cleanValue, parseNumericField, parseSiteLogAngle } from './cleanValue.js';
import { normalizeSiteLogDate } from './dates.js';

const SECTION_NUMBER = String.raw`(?:\d+(?:\.(?:\d+|x))*\.?\s+)?`;

// A line that opens a new field: text before a colon, not a URL scheme.
const LABEL_LINE_RE = new RegExp(String.raw`^\s*${SECTION_NUMBER}[A-Za-z][^:]*:(?!//)`, 'i');

const FIELD_START_RE = new RegExp(String.raw`^\s*${SECTION_NUMBER}`);

const labelCache = new Map<string, RegExp>();

function labelRegex(label: string): RegExp {
  let re = labelCache.get(label);
  if (!re) {
    re = new RegExp(String.raw`^\s*${SECTION_NUMBER}${label}[^:]*:[ \t]*(.*)$`, 'i');
    labelCache.set(label, re);
  }
  return re;
}

/** Template hints such as "(F8.4)" or "(multiple lines)" carry no data. */
export function isTemplateHint(value: string): boolean {
  return value.startsWith('(') && value.endsWith(')');
}

export function isLabelLine(line: string): boolean {
  return LABEL_LINE_RE.test(line);
}

/** Column where the field text starts, past indentation and any section number. */
function fieldColumn(line: string): number {
  return FIELD_START_RE.exec(line)?.[0].length ?? 0;
}

function leadingSpaces(line: string): number {
  return line.length - line.trimStart().length;
}

export class FieldReader {
  private readonly lines: readonly string[];

  constructor(lines: readonly string[]) {
    this.lines = lines;
  }

  private find(label: string): { lineIndex: number; value: string } | null {
    const re = labelRegex(label);
    for (let i = 0; i < this.lines.length; i++) {
      const match = re.exec(this.lines[i] ?? '');
      if (match) return { lineIndex: i, value: (match[1] ?? '').trim() };
    }
    return null;
  }

  has(label: string): boolean {
    return this.find(label) !== null;
  }

  /** Single-line value, cleaned; '' when absent or a template hint. */
  text(label: string): string {
    const found = this.find(label);
    if (!found || isTemplateHint(found.value)) return '';
    return cleanValue(found.value);
  }

  /**
   * Value that may continue on the following lines. Continuation lines are
   * indented past the label and run until a blank line or the next field
   * label; a leading ':' on continuation lines is dropped. Lines are joined
   * with '\n'.
   */
  multiline(label: string): string {
    const found = this.find(label);
    if (!found) return '';

    const parts = found.value.length > 0 ? [found.value] : [];
    const labelColumn = fieldColumn(this.lines[found.lineIndex] ?? '');
    for (let i = found.lineIndex + 1; i < this.lines.length; i++) {
      const line = this.lines[i] ?? '';
      if (line.trim().length === 0 || isLabelLine(line)) break;
      if (leadingSpaces(line) <= labelColumn) break;
      const part = line.trim().replace(/^:\s*/, '');
      if (part.length > 0) parts.push(part);
    }

    const joined = parts.join('\n');
    if (isTemplateHint(joined)) return '';
    return cleanValue(joined);
  }

  date(label: string): Date | null {
    return normalizeSiteLogDate(this.text(label));
  }

  number(label: string): number {
    return parseNumericField(this.text(label));
  }

  angle(label: string): number | null {
    return parseSiteLogAngle(this.text(label));
  }
}
