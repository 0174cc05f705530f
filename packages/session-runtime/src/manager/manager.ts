/**
 * @module @asset-session/runtime/manager
 *
 * Host-facing wrapper around a manager plugin instance.
 *
 * Every call delegates to the plugin, passing along the HostSession the
 * wrapper was built with. The Session constructs and initializes managers;
 * hosts only ever receive them from `Session.currentManager()`.
 */

import {
  ConfigurationError,
  INFO_KEY_ENTITY_REFERENCES_MATCH_PREFIX,
  REQUIRED_MANAGER_CAPABILITIES,
  type InfoDictionary,
  type ManagerCapability,
  type ManagerInterface,
  type Settings,
  type StringMap,
} from '@asset-session/contracts';
import type { HostSession } from '../host/host-session.js';

export class Manager {
  private _entityReferencePrefix?: string;

  constructor(
    private readonly _managerInterface: ManagerInterface,
    private readonly _hostSession: HostSession
  ) {}

  identifier(): string {
    return this._managerInterface.identifier();
  }

  displayName(): string {
    return this._managerInterface.displayName();
  }

  info(): InfoDictionary {
    return this._managerInterface.info();
  }

  hasCapability(capability: ManagerCapability): boolean {
    return this._managerInterface.hasCapability(capability);
  }

  /**
   * Initialize the wrapped plugin with `settings`.
   *
   * Capabilities are checked after the plugin's own initialize, since a
   * proxying plugin only knows what it supports once configured.
   *
   * @throws ConfigurationError if a required capability is missing
   */
  initialize(settings: Settings): void {
    this._managerInterface.initialize(settings, this._hostSession);
    verifyRequiredCapabilities(this._managerInterface);
    this._entityReferencePrefix = this.entityReferencePrefixFromInfo(this._managerInterface.info());
  }

  /**
   * Current manager settings. Queried from the plugin on every call.
   */
  settings(): Settings {
    return this._managerInterface.settings(this._hostSession);
  }

  updateTerminology(terms: StringMap): StringMap {
    if (!this._managerInterface.updateTerminology) {
      return { ...terms };
    }
    return this._managerInterface.updateTerminology({ ...terms }, this._hostSession);
  }

  flushCaches(): void {
    this._managerInterface.flushCaches?.(this._hostSession);
  }

  /**
   * Whether `value` looks like one of this manager's entity references.
   * Answered from the prefix the manager declared in `info()`, otherwise
   * by the plugin.
   */
  isEntityReferenceString(value: string): boolean {
    if (this._entityReferencePrefix === undefined) {
      return this._managerInterface.isEntityReferenceString(value, this._hostSession);
    }
    return value.startsWith(this._entityReferencePrefix);
  }

  /** @internal */
  managerInterface(): ManagerInterface {
    return this._managerInterface;
  }

  /** @internal */
  hostSession(): HostSession {
    return this._hostSession;
  }

  private entityReferencePrefixFromInfo(info: InfoDictionary): string | undefined {
    if (!(INFO_KEY_ENTITY_REFERENCES_MATCH_PREFIX in info)) {
      return undefined;
    }

    const prefix = info[INFO_KEY_ENTITY_REFERENCES_MATCH_PREFIX];
    const logger = this._hostSession.logger();
    if (typeof prefix !== 'string') {
      logger.log('warning', 'Entity reference prefix given but is an invalid type: should be a string.');
      return undefined;
    }

    logger.log(
      'debugApi',
      `Entity reference prefix '${prefix}' provided by manager's info() dict. ` +
        "Subsequent calls to isEntityReferenceString will use this prefix rather than call the manager's implementation."
    );
    return prefix;
  }
}

function verifyRequiredCapabilities(managerInterface: ManagerInterface): void {
  const missing = REQUIRED_MANAGER_CAPABILITIES.filter(
    (capability) => !managerInterface.hasCapability(capability)
  );
  if (missing.length === 0) {
    return;
  }

  const identifier = managerInterface.identifier();
  throw new ConfigurationError(
    `Manager implementation for '${identifier}' does not support the required capabilities: ${missing.join(', ')}`,
    { identifier, missingCapabilities: missing }
  );
}
