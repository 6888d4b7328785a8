import { describe, it, expect } from 'vitest';
import { detectSectionHeader, splitSections } from '../sitelog/sections.js';
import { FieldReader, isLabelLine, isTemplateHint } from '../sitelog/fields.js';

describe('detectSectionHeader', () => {
  it('recognises numbered equipment blocks', () => {
    expect(detectSectionHeader('3.1  Receiver Type            : TRIMBLE NETR9'))
      .toEqual({ kind: 'receiver', index: '1', template: false });
    expect(detectSectionHeader('4.12 Antenna Type             : LEIAR25.R4'))
      .toEqual({ kind: 'antenna', index: '12', template: false });
  });

  it('flags blank template entries', () => {
    expect(detectSectionHeader('3.x  Receiver Type            : (A20)'))
      .toEqual({ kind: 'receiver', index: null, template: true });
    expect(detectSectionHeader('8.1.x Humidity Sensor Model   : '))
      .toEqual({ kind: 'humidity_sensor', index: null, template: true });
  });

  it('tries three-level headers before their parents', () => {
    expect(detectSectionHeader('8.3.2 Temp. Sensor Model      : PTU300')?.kind).toBe('temperature_sensor');
    expect(detectSectionHeader('9.2.1 Multipath Sources       : ROOF')?.kind).toBe('multipath_source');
    expect(detectSectionHeader('9.3.1 Signal Obstructions     : TREES')?.kind).toBe('signal_obstruction');
    expect(detectSectionHeader('9.1 Radio Interferences       : TV')).toEqual({
      kind: 'radio_interference',
      index: '1',
      template: false,
    });
  });

  it('returns ambiguous kinds for sections 10 to 12', () => {
    expect(detectSectionHeader('10.1 Date                     : 2015-07-01')?.kind).toBe('multipath_or_episodic');
    expect(detectSectionHeader('11.  On-Site, Point of Contact Agency Information'))
      .toEqual({ kind: 'obstruction_or_contact', index: null, template: false });
    expect(detectSectionHeader('12.1 Date                     : 2015-07-01'))
      .toEqual({ kind: 'episodic_or_responsible', index: '1', template: false });
  });

  it('ignores fields and chapter titles without a sub-number', () => {
    expect(detectSectionHeader('     Site Name                : Test')).toBeNull();
    expect(detectSectionHeader('3.   GNSS Receiver Information')).toBeNull();
    expect(detectSectionHeader('')).toBeNull();
  });
});

describe('splitSections', () => {
  it('drops the preamble and keeps header lines in their blocks', () => {
    const text = [
      '     XXXX Site Information Form',
      '',
      '0.   Form',
      '     Prepared by (full name)  : Tester',
      '',
      '3.1  Receiver Type            : A',
      '     Serial Number            : 1',
      '3.2  Receiver Type            : B',
    ].join('\r\n');

    const blocks = splitSections(text);
    expect(blocks.map(b => [b.kind, b.index])).toEqual([
      ['form', null],
      ['receiver', '1'],
      ['receiver', '2'],
    ]);
    expect(blocks[0]?.header).toBe('0.   Form');
    expect(blocks[1]?.lines).toEqual([
      '3.1  Receiver Type            : A',
      '     Serial Number            : 1',
    ]);
  });
});

describe('isTemplateHint / isLabelLine', () => {
  it('treats wholly parenthesised values as hints', () => {
    expect(isTemplateHint('(F8.4)')).toBe(true);
    expect(isTemplateHint('0.0614 (approx)')).toBe(false);
  });

  it('detects field labels but not continuations or URLs', () => {
    expect(isLabelLine('     Serial Number            : 1')).toBe(true);
    expect(isLabelLine('3.1  Receiver Type            : A')).toBe(true);
    expect(isLabelLine('                              : continued')).toBe(false);
    expect(isLabelLine('     https://example.org/x')).toBe(false);
  });
});

describe('FieldReader', () => {
  const reader = new FieldReader([
    '4.1  Antenna Type             : TRM57971.00     NONE',
    '     Marker->ARP Up Ecc. (m)  :   0.0614',
    '     Marker->ARP North Ecc(m) : (F8.4)',
    '     Date Installed           : 2010-05-04T00:00Z',
    '     URL for More Information : https://example.org/tsta',
    '     Additional Information   : first line',
    '                              : second line',
    '     Primary Contact',
    '     Notes                    : (multiple lines)',
  ]);

  it('reads a field after a section number', () => {
    expect(reader.text('Antenna Type')).toBe(`${'TRM57971.00'.padEnd(16)}NONE`);
  });

  it('ignores units and padding between label and colon', () => {
    expect(reader.number('Marker->ARP Up Ecc')).toBe(0.0614);
  });

  it('blanks template hints and defaults missing numbers to 0', () => {
    expect(reader.text('Marker->ARP North Ecc')).toBe('');
    expect(reader.number('Marker->ARP North Ecc')).toBe(0);
    expect(reader.number('Marker->ARP East Ecc')).toBe(0);
  });

  it('keeps everything after the first colon', () => {
    expect(reader.text('URL for More Information')).toBe('https://example.org/tsta');
  });

  it('parses dates and reports absent labels', () => {
    expect(reader.date('Date Installed')?.toISOString()).toBe('2010-05-04T00:00:00.000Z');
    expect(reader.date('Date Removed')).toBeNull();
    expect(reader.has('Date Removed')).toBe(false);
    expect(reader.has('Date Installed')).toBe(true);
  });

  it('joins continuation lines and stops at a shallower line', () => {
    expect(reader.multiline('Additional Information')).toBe('first line\nsecond line');
    expect(reader.multiline('Notes')).toBe('');
  });
});
