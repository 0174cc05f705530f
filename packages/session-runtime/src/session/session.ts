/**
 * @module @asset-session/runtime/session
 *
 * The Session mediates between a host, its logger and a manager factory,
 * and owns the single active Manager.
 *
 * Manager selection is lazy: `useManager` / `setSettings` only record the
 * choice; the plugin is instantiated and initialized on the next
 * `currentManager()` (or `getSettings()`) call, exactly once per selection.
 *
 * Not reentrant. Hosts sharing one Session between concurrent callers must
 * serialize `useManager`, `currentManager` and `setSettings` themselves.
 *
 * @example
 * ```typescript
 * const session = new Session(host, logger, registry);
 * session.useManager('org.example.manager', { root: '/assets' });
 *
 * const manager = session.currentManager(); // instantiated + initialized here
 * const persisted = session.getSettings();   // { root: '/assets', identifier: 'org.example.manager' }
 * ```
 */

import {
  InvalidInputError,
  ManagerError,
  type HostInterface,
  type LoggerInterface,
  type ManagerDetail,
  type ManagerFactoryInterface,
  type Settings,
} from '@asset-session/contracts';
import { Host } from '../host/host.js';
import { HostSession } from '../host/host-session.js';
import { Manager } from '../manager/manager.js';
import { UNSELECTED, activate, selectManager, type SessionState } from './session-state.js';
import { mergeSessionSettings, splitSessionSettings } from './settings.js';
import { assertHostInterface, parseSettings } from './validation.js';

export class Session {
  private readonly _host: Host;
  private _state: SessionState = UNSELECTED;

  /**
   * @throws InvalidInputError if `hostInterface` is missing or does not
   * implement HostInterface
   */
  constructor(
    hostInterface: HostInterface,
    private readonly _logger: LoggerInterface,
    private readonly _managerFactory: ManagerFactoryInterface
  ) {
    assertHostInterface(hostInterface);
    this._host = new Host(hostInterface);
  }

  host(): Host {
    return this._host;
  }

  /**
   * Logger shared with every manager this session activates.
   */
  logger(): LoggerInterface {
    return this._logger;
  }

  /**
   * Managers currently known to the factory. Not cached.
   */
  registeredManagers(): ManagerDetail[] {
    return this._managerFactory.managers();
  }

  /**
   * Select the manager to use. Instantiation is deferred until
   * `currentManager()`.
   *
   * @param settings - manager-specific settings for its `initialize`
   * @throws ManagerError if `identifier` is not registered; the session is
   * left unchanged
   */
  useManager(identifier: string, settings?: Settings): void {
    if (!this._managerFactory.managerRegistered(identifier)) {
      throw new ManagerError(`Manager identifier not known: ${identifier}`, identifier);
    }

    const { managerSettings } = splitSessionSettings(settings ?? {});
    this.discardActiveManager();
    this._state = selectManager(identifier, managerSettings);
    this._logger.log('debugApi', `Selected manager '${identifier}'`);
  }

  /**
   * The active manager, instantiated and initialized on first access after
   * a selection. Undefined if no manager was ever selected.
   *
   * Errors from the factory or the plugin propagate as-is and leave the
   * selection pending, so a later call tries again.
   */
  currentManager(): Manager | undefined {
    switch (this._state.kind) {
      case 'unselected':
        return undefined;
      case 'active':
        return this._state.manager;
      case 'selected':
        this._state = activate(this._state, (identifier, settings) =>
          this.materialize(identifier, settings)
        );
        return this._state.manager;
    }
  }

  /**
   * Settings to persist and later restore with `setSettings`: the active
   * manager's own settings plus the reserved identifier key (null when no
   * manager is selected).
   */
  getSettings(): Settings {
    const manager = this.currentManager();
    if (!manager || this._state.kind !== 'active') {
      return mergeSessionSettings(null);
    }
    return mergeSessionSettings(this._state.identifier, manager.settings());
  }

  /**
   * Restore settings from `getSettings`. The reserved identifier key picks
   * the manager (null, empty or missing clears the selection); everything
   * else is handed to that manager's `initialize` on next access.
   *
   * @throws InvalidInputError on a malformed mapping or non-string identifier
   * @throws ManagerError if the identifier is not registered
   */
  setSettings(allSettings: Settings): void {
    const { identifier, managerSettings } = splitSessionSettings(parseSettings(allSettings));

    if (identifier === undefined || identifier === null || identifier === '') {
      this.discardActiveManager();
      this._state = UNSELECTED;
      return;
    }

    if (typeof identifier !== 'string') {
      throw new InvalidInputError('Manager identifier setting must be a string', {
        identifier,
      });
    }

    this.useManager(identifier, managerSettings);
  }

  private materialize(identifier: string, settings: Settings): Manager {
    this._logger.log('debugApi', `Instantiating manager '${identifier}'`);
    const managerInterface = this._managerFactory.instantiate(identifier);

    const manager = new Manager(managerInterface, new HostSession(this._host, this._logger));
    manager.initialize(settings);
    return manager;
  }

  // TODO: call a plugin shutdown hook here once ManagerInterface grows one.
  private discardActiveManager(): void {
    if (this._state.kind !== 'active') {
      return;
    }
    this._logger.log(
      'debugApi',
      `Discarding active manager '${this._state.identifier}' without teardown`
    );
  }
}
