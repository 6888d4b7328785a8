import * as fs from 'fs';
import * as path from 'path';
import { invalidParams } from './shared/index.js';

export const GNSS_SITELOG_DIR_ENV = 'GNSS_SITELOG_DIR';
export const GNSS_STA_TOOL_MODE_ENV = 'GNSS_STA_TOOL_MODE';

export type ToolExposureMode = 'standard' | 'full';

function validateDirectoryPath(dirPath: string, label: string): string {
  const resolved = path.resolve(dirPath);
  if (!fs.existsSync(resolved)) {
    throw invalidParams(`${label} does not exist`, { env: label, value: resolved });
  }
  if (!fs.statSync(resolved).isDirectory()) {
    throw invalidParams(`${label} must point to a directory`, { env: label, value: resolved });
  }
  return resolved;
}

export function getSiteLogDirFromEnv(): string | undefined {
  const raw = process.env[GNSS_SITELOG_DIR_ENV];
  if (!raw || raw.trim().length === 0) return undefined;

  const trimmed = raw.trim();
  if (!path.isAbsolute(trimmed)) {
    throw invalidParams(`${GNSS_SITELOG_DIR_ENV} must be an absolute path`, {
      env: GNSS_SITELOG_DIR_ENV,
      value: trimmed,
    });
  }
  return validateDirectoryPath(trimmed, GNSS_SITELOG_DIR_ENV);
}

/** Explicit argument first, then GNSS_SITELOG_DIR. */
export function requireSiteLogDir(explicit?: string): string {
  if (explicit !== undefined && explicit.trim().length > 0) {
    return validateDirectoryPath(explicit.trim(), 'directory');
  }
  const fromEnv = getSiteLogDirFromEnv();
  if (!fromEnv) {
    throw invalidParams(
      `No site log directory given and ${GNSS_SITELOG_DIR_ENV} is not set`,
      {
        env: GNSS_SITELOG_DIR_ENV,
        how_to: 'Pass "directory" or set GNSS_SITELOG_DIR=/abs/path/to/sitelogs',
      },
    );
  }
  return fromEnv;
}

export function getToolModeFromEnv(): ToolExposureMode {
  return process.env[GNSS_STA_TOOL_MODE_ENV] === 'full' ? 'full' : 'standard';
}
