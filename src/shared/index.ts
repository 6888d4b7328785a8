export { StaError, invalidParams, notFound, ioError, errorMessage } from './errors.js';
export type { ErrorCode } from './errors.js';
export { LOG_PREFIX, debugEnabled, logDebug } from './log.js';
