import { describe, it, expect } from 'vitest';
import { FAR_FUTURE_MS } from '../constants.js';
import { formatSiteLogDate } from '../sitelog/dates.js';
import { parseSiteLogContent } from '../sitelog/parseSiteLog.js';
import {
  buildStationEvents,
  fillMissingRemovalDates,
  findActiveEquipment,
  mergeIdenticalEvents,
  reconcileStationEvents,
  repairDuplicateInstallDates,
} from '../sitelog/reconcile.js';
import type { AntennaInterval, ReceiverInterval, SiteLogRecord } from '../sitelog/types.js';

function at(value: string): Date {
  return new Date(value);
}

function iso(date: Date | null | undefined): string | null {
  return date ? formatSiteLogDate(date) : null;
}

function receiver(type: string, serial: string, installed: string, removed: string | null = null): ReceiverInterval {
  return {
    receiver_type: type,
    satellite_system: '',
    serial_number: serial,
    firmware_version: '',
    elevation_cutoff: '',
    temperature_stabilization: '',
    notes: '',
    date_installed: at(installed),
    date_removed: removed === null ? null : at(removed),
  };
}

function antenna(
  type: string,
  serial: string,
  installed: string,
  removed: string | null = null,
  ecc: { up?: number; north?: number; east?: number } = {},
): AntennaInterval {
  return {
    antenna_type: type,
    serial_number: serial,
    antenna_reference_point: '',
    marker_arp_up_ecc: ecc.up ?? 0,
    marker_arp_north_ecc: ecc.north ?? 0,
    marker_arp_east_ecc: ecc.east ?? 0,
    alignment_from_true_north: '',
    radome_type: '',
    radome_serial_number: '',
    antenna_cable_type: '',
    antenna_cable_length: '',
    notes: '',
    date_installed: at(installed),
    date_removed: removed === null ? null : at(removed),
  };
}

function station(receivers: ReceiverInterval[], antennas: AntennaInterval[]): SiteLogRecord {
  const base = parseSiteLogContent('');
  return {
    ...base,
    site_identification: { ...base.site_identification, site_name: 'Reconcile Test Site Name Too Long' },
    receivers,
    antennas,
  };
}

describe('repairDuplicateInstallDates', () => {
  it('removes the first item at the shared instant and moves the second one second on', () => {
    const input = [
      receiver('RX A', '1', '2015-01-01T00:00:00Z'),
      receiver('RX B', '2', '2015-01-01T00:00:00Z'),
    ];
    const { items, warnings } = repairDuplicateInstallDates(input, 'receiver');

    expect(iso(items[0]?.date_removed)).toBe('2015-01-01T00:00:00Z');
    expect(iso(items[1]?.date_installed)).toBe('2015-01-01T00:00:01Z');
    expect(warnings).toEqual(['Duplicate receiver date: 2015-01-01T00:00:00Z (RX A)']);
    // inputs untouched
    expect(input[0]?.date_removed).toBeNull();
    expect(iso(input[1]?.date_installed)).toBe('2015-01-01T00:00:00Z');
  });

  it('cascades over three identical instants', () => {
    const { items, warnings } = repairDuplicateInstallDates([
      antenna('ANT A', '1', '2015-01-01T00:00:00Z'),
      antenna('ANT B', '2', '2015-01-01T00:00:00Z'),
      antenna('ANT C', '3', '2015-01-01T00:00:00Z'),
    ], 'antenna');

    expect(items.map(i => iso(i.date_installed))).toEqual([
      '2015-01-01T00:00:00Z',
      '2015-01-01T00:00:01Z',
      '2015-01-01T00:00:02Z',
    ]);
    expect(items.map(i => iso(i.date_removed))).toEqual([
      '2015-01-01T00:00:00Z',
      '2015-01-01T00:00:01Z',
      null,
    ]);
    expect(warnings).toEqual([
      'Duplicate antenna date: 2015-01-01T00:00:00Z (ANT A)',
      'Duplicate antenna date: 2015-01-01T00:00:01Z (ANT B)',
    ]);
  });

  it('sorts by install date and leaves distinct dates alone', () => {
    const { items, warnings } = repairDuplicateInstallDates([
      receiver('LATER', '2', '2016-01-01T00:00:00Z'),
      receiver('EARLIER', '1', '2015-01-01T00:00:00Z'),
    ], 'receiver');
    expect(items.map(i => i.receiver_type)).toEqual(['EARLIER', 'LATER']);
    expect(warnings).toEqual([]);
  });
});

describe('fillMissingRemovalDates', () => {
  it('closes each open item at the next install and leaves the last open', () => {
    const items = fillMissingRemovalDates([
      receiver('A', '1', '2010-01-01T00:00:00Z'),
      receiver('B', '2', '2012-06-01T12:00:00Z'),
      receiver('C', '3', '2014-01-01T00:00:00Z'),
    ]);
    expect(items.map(i => iso(i.date_removed))).toEqual([
      '2012-06-01T12:00:00Z',
      '2014-01-01T00:00:00Z',
      null,
    ]);
  });

  it('keeps explicit removal dates', () => {
    const items = fillMissingRemovalDates([
      receiver('A', '1', '2010-01-01T00:00:00Z', '2011-01-01T00:00:00Z'),
      receiver('B', '2', '2012-01-01T00:00:00Z'),
    ]);
    expect(iso(items[0]?.date_removed)).toBe('2011-01-01T00:00:00Z');
  });
});

describe('findActiveEquipment', () => {
  const items = [
    receiver('A', '1', '2010-01-01T00:00:00Z', '2012-01-01T00:00:00Z'),
    receiver('B', '2', '2012-01-01T00:00:00Z'),
  ];

  it('uses a half-open window', () => {
    expect(findActiveEquipment(items, at('2011-12-31T23:59:59Z'))?.receiver_type).toBe('A');
    expect(findActiveEquipment(items, at('2012-01-01T00:00:00Z'))?.receiver_type).toBe('B');
    expect(findActiveEquipment(items, at('2009-12-31T00:00:00Z'))).toBeNull();
  });

  it('prefers the latest install on overlap', () => {
    const overlapping = [
      receiver('OLD', '1', '2010-01-01T00:00:00Z'),
      receiver('NEW', '2', '2011-01-01T00:00:00Z'),
    ];
    expect(findActiveEquipment(overlapping, at('2011-06-01T00:00:00Z'))?.receiver_type).toBe('NEW');
  });
});

describe('reconcileStationEvents', () => {
  it('cuts the timeline at every change and keeps it contiguous', () => {
    const { items, warnings } = reconcileStationEvents(station(
      [
        receiver('RX ONE', '1001', '2010-01-01T00:00:00Z', '2014-01-01T00:00:00Z'),
        receiver('RX TWO', '1002', '2014-01-01T00:00:00Z'),
      ],
      [
        antenna('ANT1', '2001', '2010-01-01T00:00:00Z', '2016-01-01T00:00:00Z'),
        antenna('ANT2', '2002', '2016-01-01T00:00:00Z', null, { up: 0.1 }),
      ],
    ));

    expect(warnings).toEqual([]);
    expect(items.map(e => [iso(e.start), iso(e.end), e.receiver_type, e.antenna_type])).toEqual([
      ['2010-01-01T00:00:00Z', '2013-12-31T23:59:59Z', 'RX ONE', `${'ANT1'.padEnd(16)}NONE`],
      ['2014-01-01T00:00:00Z', '2015-12-31T23:59:59Z', 'RX TWO', `${'ANT1'.padEnd(16)}NONE`],
      ['2016-01-01T00:00:00Z', '2099-12-31T23:59:59Z', 'RX TWO', `${'ANT2'.padEnd(16)}NONE`],
    ]);
    for (let i = 0; i + 1 < items.length; i++) {
      const curr = items[i];
      const next = items[i + 1];
      expect(next!.start.getTime() - curr!.end.getTime()).toBe(1000);
    }
    expect(items[2]?.end.getTime()).toBe(FAR_FUTURE_MS);
    expect(items[0]?.site_name).toBe('Reconcile Test Site Na');
  });

  it('ends the last period at the earlier removal date', () => {
    const { items } = reconcileStationEvents(station(
      [receiver('RX', '1', '2010-01-01T00:00:00Z', '2020-01-01T00:00:00Z')],
      [antenna('ANT', '2', '2010-01-01T00:00:00Z')],
    ));
    expect(items.map(e => [iso(e.start), iso(e.end)])).toEqual([
      ['2010-01-01T00:00:00Z', '2019-12-31T23:59:59Z'],
    ]);
  });

  it('merges consecutive periods with identical equipment', () => {
    const { items } = reconcileStationEvents(station(
      [
        receiver('RX', '555', '2010-01-01T00:00:00Z', '2012-01-01T00:00:00Z'),
        receiver('RX', '555', '2012-01-01T00:00:00Z', '2014-01-01T00:00:00Z'),
        receiver('RX', '555', '2014-01-01T00:00:00Z'),
      ],
      [antenna('ANT', '777', '2010-01-01T00:00:00Z')],
    ));
    expect(items).toHaveLength(1);
    expect(iso(items[0]?.start)).toBe('2010-01-01T00:00:00Z');
    expect(items[0]?.end.getTime()).toBe(FAR_FUTURE_MS);
  });

  it('skips periods without both a receiver and an antenna', () => {
    const { items } = reconcileStationEvents(station(
      [receiver('RX', '1', '2010-01-01T00:00:00Z')],
      [antenna('ANT', '2', '2012-01-01T00:00:00Z')],
    ));
    expect(items.map(e => iso(e.start))).toEqual(['2012-01-01T00:00:00Z']);
  });

  it('drops zero-length periods with a warning', () => {
    const { items, warnings } = reconcileStationEvents(station(
      [
        receiver('RX A', '1', '2015-01-01T00:00:00Z', '2015-01-01T00:00:01Z'),
        receiver('RX B', '2', '2015-01-01T00:00:01Z'),
      ],
      [antenna('ANT', '3', '2015-01-01T00:00:00Z')],
    ));
    expect(warnings).toEqual(['Dropped empty period at 2015-01-01T00:00:00Z']);
    expect(items.map(e => [iso(e.start), e.receiver_type])).toEqual([['2015-01-01T00:00:01Z', 'RX B']]);
  });

  it('returns nothing when either series is empty', () => {
    expect(reconcileStationEvents(station([], [antenna('ANT', '1', '2010-01-01T00:00:00Z')])).items).toEqual([]);
    expect(buildStationEvents(station([receiver('RX', '1', '2010-01-01T00:00:00Z')], []))).toEqual([]);
  });
});

describe('mergeIdenticalEvents', () => {
  it('keeps periods apart when offsets differ', () => {
    const { items } = reconcileStationEvents(station(
      [receiver('RX', '1', '2010-01-01T00:00:00Z')],
      [
        antenna('ANT', '2', '2010-01-01T00:00:00Z', '2011-01-01T00:00:00Z', { up: 0.1 }),
        antenna('ANT', '2', '2011-01-01T00:00:00Z', null, { up: 0.2 }),
      ],
    ));
    expect(mergeIdenticalEvents(items)).toHaveLength(2);
  });
});
