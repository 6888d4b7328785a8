/**
 * Equipment timeline reconciliation.
 *
 * A site log dates receivers and antennas independently. The STA file needs
 * one linear timeline per station where every row has exactly one receiver
 * and one antenna, so the two series are cut at the union of their change
 * dates and the active pair looked up for each cut.
 */

import { FAR_FUTURE_MS } from '../constants.js';
import {
  cleanReceiverType,
  effectiveRadome,
  formatAntennaType,
  sanitizeSerial,
  truncateSiteName,
} from '../sta/fields.js';
import { addSeconds, formatSiteLogDate } from './dates.js';
import type {
  AntennaInterval,
  EquipmentInterval,
  EquipmentKind,
  ReceiverInterval,
  SiteLogRecord,
} from './types.js';

export interface StaEvent {
  start: Date;
  /** Inclusive; FAR_FUTURE_MS for open-ended periods */
  end: Date;
  receiver_type: string;
  receiver_serial: string;
  antenna_type: string;
  antenna_serial: string;
  radome_type: string;
  north_ecc: number;
  east_ecc: number;
  up_ecc: number;
  site_name: string;
}

export interface Reconciled<T> {
  items: T[];
  warnings: string[];
}

function byInstallDate(a: EquipmentInterval, b: EquipmentInterval): number {
  return a.date_installed.getTime() - b.date_installed.getTime();
}

function describeEquipment(item: EquipmentInterval): string {
  if ('receiver_type' in item && typeof item.receiver_type === 'string') return item.receiver_type;
  if ('antenna_type' in item && typeof item.antenna_type === 'string') return item.antenna_type;
  return '';
}

// ── Per-series repair ─────────────────────────────────────────────────────

/**
 * Two items installed at the same instant: the earlier one is removed at that
 * instant and the later one moved one second on, so the later item owns the
 * boundary. A run of three or more identical instants cascades, each item one
 * second after its predecessor.
 */
export function repairDuplicateInstallDates<T extends EquipmentInterval>(
  items: readonly T[],
  kind: EquipmentKind,
): Reconciled<T> {
  const sorted = items.map(item => ({ ...item })).sort(byInstallDate);
  const warnings: string[] = [];

  for (let i = 0; i + 1 < sorted.length; i++) {
    const curr = sorted[i];
    const next = sorted[i + 1];
    if (!curr || !next) continue;
    if (next.date_installed.getTime() > curr.date_installed.getTime()) continue;

    warnings.push(
      `Duplicate ${kind} date: ${formatSiteLogDate(curr.date_installed)} (${describeEquipment(curr)})`,
    );
    curr.date_removed = curr.date_installed;
    next.date_installed = addSeconds(curr.date_installed, 1);
  }

  return { items: sorted, warnings };
}

/** Items without a removal date end where the next item starts; the last stays open. */
export function fillMissingRemovalDates<T extends EquipmentInterval>(items: readonly T[]): T[] {
  const sorted = items.map(item => ({ ...item })).sort(byInstallDate);
  for (let i = 0; i + 1 < sorted.length; i++) {
    const curr = sorted[i];
    const next = sorted[i + 1];
    if (curr && next && curr.date_removed === null) {
      curr.date_removed = next.date_installed;
    }
  }
  return sorted;
}

export function reconcileEquipment<T extends EquipmentInterval>(
  items: readonly T[],
  kind: EquipmentKind,
): Reconciled<T> {
  const { items: deduplicated, warnings } = repairDuplicateInstallDates(items, kind);
  return { items: fillMissingRemovalDates(deduplicated), warnings };
}

// ── Cross-series events ───────────────────────────────────────────────────

/**
 * The item whose [install, removal) window contains the instant. If several
 * do, the most recently installed wins.
 */
export function findActiveEquipment<T extends EquipmentInterval>(
  items: readonly T[],
  at: Date,
): T | null {
  const instant = at.getTime();
  let active: T | null = null;
  for (const item of items) {
    const installed = item.date_installed.getTime();
    const removed = item.date_removed?.getTime() ?? FAR_FUTURE_MS;
    if (installed <= instant && removed > instant) {
      if (active === null || installed > active.date_installed.getTime()) {
        active = item;
      }
    }
  }
  return active;
}

function changeBoundaries(
  receivers: readonly ReceiverInterval[],
  antennas: readonly AntennaInterval[],
): number[] {
  const boundaries = new Set<number>();
  for (const item of [...receivers, ...antennas]) {
    boundaries.add(item.date_installed.getTime());
    const removed = item.date_removed?.getTime();
    if (removed !== undefined && removed < FAR_FUTURE_MS) boundaries.add(removed);
  }
  return [...boundaries].sort((a, b) => a - b);
}

function sameEquipment(a: StaEvent, b: StaEvent): boolean {
  return a.receiver_type === b.receiver_type
    && a.receiver_serial === b.receiver_serial
    && a.antenna_type === b.antenna_type
    && a.antenna_serial === b.antenna_serial
    && a.north_ecc === b.north_ecc
    && a.east_ecc === b.east_ecc
    && a.up_ecc === b.up_ecc;
}

/** Consecutive events with identical equipment and offsets collapse into one. */
export function mergeIdenticalEvents(events: readonly StaEvent[]): StaEvent[] {
  const merged: StaEvent[] = [];
  for (const event of events) {
    const prev = merged[merged.length - 1];
    if (prev && sameEquipment(prev, event)) {
      merged[merged.length - 1] = { ...prev, end: event.end };
    } else {
      merged.push({ ...event });
    }
  }
  return merged;
}

export function toStaEvent(
  start: Date,
  end: Date,
  receiver: ReceiverInterval,
  antenna: AntennaInterval,
  siteName: string,
): StaEvent {
  return {
    start,
    end,
    receiver_type: cleanReceiverType(receiver.receiver_type),
    receiver_serial: sanitizeSerial(receiver.serial_number),
    antenna_type: formatAntennaType(antenna.antenna_type, antenna.radome_type),
    antenna_serial: sanitizeSerial(antenna.serial_number),
    radome_type: effectiveRadome(antenna.antenna_type, antenna.radome_type),
    north_ecc: antenna.marker_arp_north_ecc,
    east_ecc: antenna.marker_arp_east_ecc,
    up_ecc: antenna.marker_arp_up_ecc,
    site_name: truncateSiteName(siteName),
  };
}

/**
 * Cuts the receiver and antenna series at every install and finite removal
 * date. Each period ends one second before the next cut; the last one ends
 * with the earlier of the two active items' removal dates (FAR_FUTURE when
 * both are open). Periods with no receiver or no antenna are skipped, empty
 * periods dropped.
 */
export function reconcileStationEvents(record: SiteLogRecord): Reconciled<StaEvent> {
  const receivers = [...record.receivers].sort(byInstallDate);
  const antennas = [...record.antennas].sort(byInstallDate);
  const warnings: string[] = [];
  if (receivers.length === 0 || antennas.length === 0) return { items: [], warnings };

  const siteName = record.site_identification.site_name;
  const boundaries = changeBoundaries(receivers, antennas);
  const events: StaEvent[] = [];

  boundaries.forEach((startMs, i) => {
    const start = new Date(startMs);
    const receiver = findActiveEquipment(receivers, start);
    const antenna = findActiveEquipment(antennas, start);
    if (!receiver || !antenna) return;

    const nextMs = boundaries[i + 1];
    const endMs = nextMs !== undefined
      ? nextMs - 1000
      : Math.min(
        receiver.date_removed?.getTime() ?? FAR_FUTURE_MS,
        antenna.date_removed?.getTime() ?? FAR_FUTURE_MS,
      );

    if (endMs <= startMs) {
      warnings.push(`Dropped empty period at ${formatSiteLogDate(start)}`);
      return;
    }
    events.push(toStaEvent(start, new Date(endMs), receiver, antenna, siteName));
  });

  return { items: mergeIdenticalEvents(events), warnings };
}

export function buildStationEvents(record: SiteLogRecord): StaEvent[] {
  return reconcileStationEvents(record).items;
}
