/**
 * Column formatters for the Bernese station information (.STA) file.
 *
 * The file is read by byte column, so every helper here returns a value of
 * the exact width its column expects (or a value the row builder pads).
 */

import { DEFAULT_RADOME, UNKNOWN_SERIAL, isOpenEnded } from '../constants.js';

export const RECEIVER_TYPE_WIDTH = 20;
export const ANTENNA_TYPE_WIDTH = 20;
export const RADOME_WIDTH = 4;
export const SERIAL_DIGITS = 6;
export const SITE_NAME_WIDTH = 22;

export function cleanReceiverType(receiverType: string): string {
  return receiverType.trim().slice(0, RECEIVER_TYPE_WIDTH);
}

/** Digits only, last six kept; UNKNOWN_SERIAL when nothing numeric is left. */
export function sanitizeSerial(serial: string): string {
  const digits = serial.replace(/\D/g, '');
  if (digits.length === 0) return UNKNOWN_SERIAL;
  return digits.slice(-SERIAL_DIGITS);
}

/**
 * 20-character antenna designator: antenna name left-justified, radome code
 * right-justified in the last four columns.
 *
 * Site logs often write the radome into the antenna type field as well
 * ("TRM59800.00     SCIS"); only the first token is the antenna name, and the
 * second token stands in for the radome when the radome field is blank.
 */
export function formatAntennaType(antennaType: string, radomeType: string): string {
  const parts = antennaType.trim().split(/\s+/).filter(part => part.length > 0);
  const name = parts[0];
  if (name === undefined) return '';

  const radome = (radomeType.trim() || parts[1] || DEFAULT_RADOME).slice(0, RADOME_WIDTH);
  const truncatedName = name.slice(0, ANTENNA_TYPE_WIDTH - radome.length);
  const padding = ANTENNA_TYPE_WIDTH - truncatedName.length - radome.length;
  return `${truncatedName}${' '.repeat(padding)}${radome}`;
}

/** Radome code as written into the designator. */
export function effectiveRadome(antennaType: string, radomeType: string): string {
  const designator = formatAntennaType(antennaType, radomeType);
  return designator.length === 0 ? DEFAULT_RADOME : designator.slice(-RADOME_WIDTH).trim();
}

/** %8.4f */
export function formatOffset(metres: number): string {
  return metres.toFixed(4).padStart(8, ' ');
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** YYYY MM DD HH MM SS (UTC) */
export function formatStaEpoch(date: Date): string {
  return [
    String(date.getUTCFullYear()).padStart(4, ' '),
    pad2(date.getUTCMonth() + 1),
    pad2(date.getUTCDate()),
    pad2(date.getUTCHours()),
    pad2(date.getUTCMinutes()),
    pad2(date.getUTCSeconds()),
  ].join(' ');
}

/** Open-ended windows leave the TO column blank. */
export function formatStaEndEpoch(date: Date): string {
  return isOpenEnded(date) ? ' '.repeat(19) : formatStaEpoch(date);
}

export function truncateSiteName(siteName: string): string {
  return siteName.slice(0, SITE_NAME_WIDTH);
}
