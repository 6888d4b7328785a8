import { describe, it, expect } from 'vitest';
import { FAR_FUTURE_MS } from '../constants.js';
import {
  cleanReceiverType,
  effectiveRadome,
  formatAntennaType,
  formatOffset,
  formatStaEndEpoch,
  formatStaEpoch,
  sanitizeSerial,
  truncateSiteName,
} from '../sta/fields.js';

describe('sanitizeSerial', () => {
  it('keeps digits only', () => {
    expect(sanitizeSerial('SN-12AB34')).toBe('1234');
    expect(sanitizeSerial('5012K67890')).toBe('267890');
  });

  it('keeps the last six digits', () => {
    expect(sanitizeSerial('1441012345')).toBe('012345');
  });

  it('substitutes 999999 when no digit is left', () => {
    expect(sanitizeSerial('N/A')).toBe('999999');
    expect(sanitizeSerial('')).toBe('999999');
  });
});

describe('cleanReceiverType', () => {
  it('trims and cuts to 20 characters', () => {
    expect(cleanReceiverType('  TRIMBLE NETR9  ')).toBe('TRIMBLE NETR9');
    expect(cleanReceiverType('ABCDEFGHIJKLMNOPQRSTUVWXYZ')).toBe('ABCDEFGHIJKLMNOPQRST');
  });
});

describe('formatAntennaType', () => {
  it('puts the radome in the last four columns', () => {
    expect(formatAntennaType(`${'TRM57971.00'.padEnd(16)}NONE`, 'NONE')).toBe(`${'TRM57971.00'.padEnd(16)}NONE`);
    expect(formatAntennaType('LEIAR25.R4', 'LEIT')).toBe(`${'LEIAR25.R4'.padEnd(16)}LEIT`);
  });

  it('defaults the radome to NONE', () => {
    expect(formatAntennaType('LEIAR25.R4', '')).toBe(`${'LEIAR25.R4'.padEnd(16)}NONE`);
  });

  it('takes the radome from the antenna field when the radome field is blank', () => {
    expect(formatAntennaType(`${'ASH701945E_M'.padEnd(16)}SCIS`, '')).toBe(`${'ASH701945E_M'.padEnd(16)}SCIS`);
  });

  it('truncates long names and radomes', () => {
    expect(formatAntennaType('ABCDEFGHIJKLMNOPQRSTUV', 'DOME')).toBe('ABCDEFGHIJKLMNOPDOME');
    expect(formatAntennaType('ANT', 'RADOME5')).toBe(`${'ANT'.padEnd(16)}RADO`);
  });

  it('returns an empty designator for an empty type', () => {
    expect(formatAntennaType('', 'NONE')).toBe('');
    expect(effectiveRadome('', '')).toBe('NONE');
  });

  it('always yields 20 characters', () => {
    for (const [name, radome] of [['A', ''], ['TRM59800.00', 'SCIS'], ['JAVRINGANT_DM', 'JVDM']] as const) {
      expect(formatAntennaType(name, radome)).toHaveLength(20);
    }
  });
});

describe('effectiveRadome', () => {
  it('reports the code written into the designator', () => {
    expect(effectiveRadome('TRM57971.00', '')).toBe('NONE');
    expect(effectiveRadome(`${'ASH701945E_M'.padEnd(16)}SCIS`, '')).toBe('SCIS');
    expect(effectiveRadome('LEIAR25.R4', 'LEIT')).toBe('LEIT');
  });
});

describe('formatOffset', () => {
  it('formats as %8.4f', () => {
    expect(formatOffset(0.1)).toBe('  0.1000');
    expect(formatOffset(0.0614)).toBe('  0.0614');
    expect(formatOffset(-0.001)).toBe(' -0.0010');
    expect(formatOffset(0)).toBe('  0.0000');
  });
});

describe('formatStaEpoch / formatStaEndEpoch', () => {
  it('writes YYYY MM DD HH MM SS in UTC', () => {
    expect(formatStaEpoch(new Date(Date.UTC(2020, 0, 2, 3, 4, 5)))).toBe('2020 01 02 03 04 05');
  });

  it('leaves the end column blank for open-ended periods', () => {
    expect(formatStaEndEpoch(new Date(FAR_FUTURE_MS))).toBe(' '.repeat(19));
    expect(formatStaEndEpoch(new Date(Date.UTC(2018, 2, 12, 10, 29, 59)))).toBe('2018 03 12 10 29 59');
  });
});

describe('truncateSiteName', () => {
  it('cuts to 22 characters', () => {
    expect(truncateSiteName('A site name that is far too long')).toBe('A site name that is fa');
    expect(truncateSiteName('Short')).toBe('Short');
  });
});
