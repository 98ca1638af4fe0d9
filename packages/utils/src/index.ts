/**
 * @model-bootstrap/utils - Shared utilities package
 *
 * Logger, configuration loading, error classes and formatting helpers.
 */

export {
  Logger,
  winstonLogger,
  createLogger,
  enableFileLogging,
  setLogLevel,
} from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';

export { BYTES_PER_GB, formatGigabytes, formatSizeColumn, formatElapsedTime } from './format.js';
