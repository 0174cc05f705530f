/**
 * @asset-session/runtime
 *
 * Host-side session layer: select a manager plugin, activate it lazily and
 * move its settings in and out of the host.
 *
 * @example
 * ```typescript
 * import { Session, ManagerPluginRegistry, createPinoLogger, SeverityFilter } from '@asset-session/runtime';
 *
 * const logger = new SeverityFilter(createPinoLogger());
 * const registry = new ManagerPluginRegistry(logger);
 * registry.register({ identifier: 'org.example.manager', create: () => new ExampleManager() });
 *
 * const session = new Session({ identifier: () => 'org.example.editor' }, logger, registry);
 * session.setSettings(savedSettings);
 * const manager = session.currentManager();
 * ```
 */

// Session
export {
  Session,
  splitSessionSettings,
  mergeSessionSettings,
  hostInterfaceSchema,
  settingsSchema,
  assertHostInterface,
  parseSettings,
} from './session/index.js';
export type {
  SessionState,
  UnselectedState,
  SelectedState,
  ActiveState,
  SplitSettings,
} from './session/index.js';

// Host
export { Host, HostSession } from './host/index.js';

// Manager
export { Manager } from './manager/index.js';

// Registry
export { ManagerPluginRegistry } from './registry/index.js';
export type { ManagerPlugin } from './registry/index.js';

// Config
export {
  loadDefaultManagerConfig,
  createDefaultSession,
  defaultManagerConfigSchema,
  DEFAULT_CONFIG_ENV_VAR,
} from './config/index.js';
export type { DefaultManagerConfig, DefaultSessionOptions } from './config/index.js';

// Logging
export {
  PinoLogger,
  createPinoLogger,
  SeverityFilter,
  parseSeverity,
  LOGGING_SEVERITY_ENV_VAR,
} from './logging/index.js';
export type { PinoLoggerOptions, SeverityFilterOptions } from './logging/index.js';

// Contracts, re-exported for hosts that only depend on the runtime
export * from '@asset-session/contracts';
