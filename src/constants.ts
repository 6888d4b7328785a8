export const STA_INFO = 'sta_info' as const;
export const STA_PARSE_SITE_LOG = 'sta_parse_site_log' as const;
export const STA_PARSE_DIRECTORY = 'sta_parse_directory' as const;
export const STA_STATION_EVENTS = 'sta_station_events' as const;
export const STA_WRITE_FILE = 'sta_write_file' as const;
export const STA_NORMALIZE_DATE = 'sta_normalize_date' as const;

export type StaToolName =
  | typeof STA_INFO
  | typeof STA_PARSE_SITE_LOG
  | typeof STA_PARSE_DIRECTORY
  | typeof STA_STATION_EVENTS
  | typeof STA_WRITE_FILE
  | typeof STA_NORMALIZE_DATE;

// Open-ended equipment windows run to this instant. The writer leaves the
// "TO" column blank for anything in the sentinel year or later.
export const FAR_FUTURE_YEAR = 2099;
export const FAR_FUTURE_MS = Date.UTC(FAR_FUTURE_YEAR, 11, 31, 23, 59, 59);

export function isOpenEnded(date: Date): boolean {
  return date.getUTCFullYear() >= FAR_FUTURE_YEAR;
}

/** Serial written when a serial number has no digits at all. */
export const UNKNOWN_SERIAL = '999999';
export const DEFAULT_RADOME = 'NONE';
