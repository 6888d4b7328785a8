/**
 * Splits a site log into numbered section blocks.
 *
 * Repeatable sections (receivers, antennas, ties, sensors, …) carry a
 * sub-number, one block per equipment change: "3.1", "3.2", "8.1.3". The blank
 * template entries ("3.x", "8.1.x") are kept as boundaries but flagged so the
 * caller can skip them.
 *
 * Sections 10, 11 and 12 mean different things in different generations of
 * the form; those blocks come back with an ambiguous kind and are resolved
 * by the record parser.
 */

export type SectionKind =
  | 'form'
  | 'site_identification'
  | 'site_location'
  | 'receiver'
  | 'antenna'
  | 'surveyed_local_tie'
  | 'frequency_standard'
  | 'collocation'
  | 'humidity_sensor'
  | 'pressure_sensor'
  | 'temperature_sensor'
  | 'water_vapor_sensor'
  | 'radio_interference'
  | 'multipath_source'
  | 'signal_obstruction'
  | 'multipath_or_episodic'
  | 'obstruction_or_contact'
  | 'episodic_or_responsible'
  | 'more_information';

export interface SectionBlock {
  readonly kind: SectionKind;
  /** Sub-number of a repeatable block ("2" for "3.2"); null for single sections */
  readonly index: string | null;
  /** "3.x"-style blank template entry */
  readonly template: boolean;
  readonly header: string;
  readonly lines: readonly string[];
}

interface HeaderPattern {
  kind: SectionKind;
  re: RegExp;
}

// Order matters: the three-level sensor and condition headers must be tried
// before their two-level parents.
const HEADER_PATTERNS: readonly HeaderPattern[] = [
  { kind: 'form', re: /^0\.\s+Form/i },
  { kind: 'site_identification', re: /^1\.\s+Site Identification/i },
  { kind: 'site_location', re: /^2\.\s+Site Location/i },
  { kind: 'receiver', re: /^3\.(\d+|x)\s+/i },
  { kind: 'antenna', re: /^4\.(\d+|x)\s+/i },
  { kind: 'surveyed_local_tie', re: /^5\.(\d+|x)\s+/i },
  { kind: 'frequency_standard', re: /^6\.(\d+|x)\s+/i },
  { kind: 'collocation', re: /^7\.(\d+|x)\s+/i },
  { kind: 'humidity_sensor', re: /^8\.1\.(\d+|x)\s+/i },
  { kind: 'pressure_sensor', re: /^8\.2\.(\d+|x)\s+/i },
  { kind: 'temperature_sensor', re: /^8\.3\.(\d+|x)\s+/i },
  { kind: 'water_vapor_sensor', re: /^8\.4\.(\d+|x)\s+/i },
  { kind: 'radio_interference', re: /^9\.1\.(\d+|x)\s+/i },
  { kind: 'multipath_source', re: /^9\.2\.(\d+|x)\s+/i },
  { kind: 'signal_obstruction', re: /^9\.3\.(\d+|x)\s+/i },
  { kind: 'radio_interference', re: /^9\.(\d+|x)\s+/i },
  { kind: 'multipath_or_episodic', re: /^10\.(\d+|x)\s+/i },
  { kind: 'obstruction_or_contact', re: /^11\.(\d+|x)?\s+/i },
  { kind: 'episodic_or_responsible', re: /^12\.(\d+|x)?\s+/i },
  { kind: 'more_information', re: /^13\.\s+/i },
];

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

export function detectSectionHeader(
  line: string,
): { kind: SectionKind; index: string | null; template: boolean } | null {
  const trimmed = line.trim();
  for (const { kind, re } of HEADER_PATTERNS) {
    const match = re.exec(trimmed);
    if (!match) continue;
    const index = match[1] ?? null;
    const template = index !== null && index.toLowerCase() === 'x';
    return { kind, index: template ? null : index, template };
  }
  return null;
}

/** Lines before the first recognised header (title, instructions) are discarded. */
export function splitSections(text: string): SectionBlock[] {
  const blocks: SectionBlock[] = [];
  let current: { kind: SectionKind; index: string | null; template: boolean; header: string } | null = null;
  let lines: string[] = [];

  const flush = (): void => {
    if (current && lines.length > 0) {
      blocks.push({ ...current, lines: Object.freeze(lines) });
    }
  };

  for (const rawLine of normalizeLineEndings(text).split('\n')) {
    const line = rawLine.trimEnd();
    const header = detectSectionHeader(line);
    if (header) {
      flush();
      current = { ...header, header: line.trim() };
      lines = [line];
    } else if (current) {
      lines.push(line);
    }
  }
  flush();

  return blocks;
}
