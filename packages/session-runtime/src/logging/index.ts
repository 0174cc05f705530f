export { PinoLogger, createPinoLogger } from './pino-logger.js';
export type { PinoLoggerOptions } from './pino-logger.js';
export {
  SeverityFilter,
  parseSeverity,
  LOGGING_SEVERITY_ENV_VAR,
} from './severity-filter.js';
export type { SeverityFilterOptions } from './severity-filter.js';
