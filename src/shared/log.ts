export const LOG_PREFIX = '[gnss-sta]';

export const GNSS_STA_DEBUG_ENV = 'GNSS_STA_DEBUG';

export function debugEnabled(): boolean {
  const raw = process.env[GNSS_STA_DEBUG_ENV]?.trim();
  return raw !== undefined && raw.length > 0 && raw !== '0';
}

/** Per-field noise (unparseable dates and the like); silent unless GNSS_STA_DEBUG is set. */
export function logDebug(message: string): void {
  if (debugEnabled()) console.debug(`${LOG_PREFIX} ${message}`);
}
