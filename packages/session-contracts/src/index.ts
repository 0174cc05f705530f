/**
 * @asset-session/contracts
 *
 * Host/manager contracts - pure types and constants with 0 runtime
 * dependencies. Implemented by hosts and manager plugins, consumed by
 * @asset-session/runtime.
 */

// Settings
export type { SettingValue, Settings, InfoDictionary, StringMap } from './settings.js';
export {
  MANAGER_IDENTIFIER_SETTING,
  INFO_KEY_ENTITY_REFERENCES_MATCH_PREFIX,
} from './settings.js';

// Logging
export type { Severity, LoggerInterface } from './logger.js';
export { SEVERITY_NAMES, severityRank, isSeverity } from './logger.js';

// Host
export type { HostInterface, HostAdapter, HostSessionHandle } from './host.js';

// Manager
export type {
  ManagerCapability,
  ManagerInterface,
  ManagerDetail,
  ManagerFactoryInterface,
} from './manager.js';
export { REQUIRED_MANAGER_CAPABILITIES } from './manager.js';

// Errors
export {
  SessionError,
  InvalidInputError,
  ManagerError,
  ConfigurationError,
  ErrorCode,
  isSessionError,
} from './errors.js';
export type { ErrorCodeType, SerializedError } from './errors.js';
