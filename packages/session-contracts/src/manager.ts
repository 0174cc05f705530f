/**
 * @module @asset-session/contracts/manager
 *
 * Contracts implemented by manager plugins and by the registry that
 * creates them.
 */

import type { HostSessionHandle } from './host.js';
import type { InfoDictionary, Settings, StringMap } from './settings.js';

/**
 * Optional feature sets a manager may support
 */
export type ManagerCapability =
  | 'entityReferenceIdentification'
  | 'managementPolicyQueries'
  | 'entityTraitIntrospection'
  | 'statefulContexts'
  | 'customTerminology'
  | 'resolution'
  | 'publishing'
  | 'relationshipQueries'
  | 'existenceQueries'
  | 'defaultEntityReferences';

/**
 * Capabilities every manager must report once initialized
 */
export const REQUIRED_MANAGER_CAPABILITIES: readonly ManagerCapability[] = [
  'entityReferenceIdentification',
  'managementPolicyQueries',
  'entityTraitIntrospection',
];

/**
 * Manager plugin instance, as returned by a ManagerFactoryInterface.
 *
 * All calls are synchronous. `initialize` is called exactly once per
 * instance, before any other stateful call.
 */
export interface ManagerInterface {
  identifier(): string;
  displayName(): string;
  info(): InfoDictionary;

  /**
   * Whether the manager supports the given capability. Only meaningful
   * after `initialize`.
   */
  hasCapability(capability: ManagerCapability): boolean;

  /**
   * Apply settings and prepare for use. The host session may be retained
   * for later logging.
   */
  initialize(settings: Settings, hostSession: HostSessionHandle): void;

  /**
   * Whether `value` is one of this manager's entity references. Not
   * consulted when the manager declares a prefix in `info()`.
   */
  isEntityReferenceString(value: string, hostSession: HostSessionHandle): boolean;

  /** Current settings, suitable for a later `initialize` */
  settings(hostSession: HostSessionHandle): Settings;

  /** Replace host terminology with manager-specific terms */
  updateTerminology?(terms: StringMap, hostSession: HostSessionHandle): StringMap;

  /** Drop any cached data */
  flushCaches?(hostSession: HostSessionHandle): void;
}

/**
 * Registry entry describing an available manager
 */
export interface ManagerDetail {
  identifier: string;
  displayName: string;
  info: InfoDictionary;
}

/**
 * Lists and instantiates manager plugins
 */
export interface ManagerFactoryInterface {
  managers(): ManagerDetail[];
  managerRegistered(identifier: string): boolean;
  /** Create a new, uninitialized plugin instance */
  instantiate(identifier: string): ManagerInterface;
}
