/**
 * @module @asset-session/runtime/registry
 *
 * In-memory manager factory. Hosts (or their plugin loaders) register
 * manager plugins explicitly; there is no process-wide registry.
 *
 * @example
 * ```typescript
 * const registry = new ManagerPluginRegistry(logger);
 * registry.register({
 *   identifier: 'org.example.manager',
 *   displayName: 'Example Manager',
 *   create: () => new ExampleManagerInterface(),
 * });
 *
 * const session = new Session(host, logger, registry);
 * ```
 */

import {
  InvalidInputError,
  ManagerError,
  type InfoDictionary,
  type LoggerInterface,
  type ManagerDetail,
  type ManagerFactoryInterface,
  type ManagerInterface,
} from '@asset-session/contracts';

/**
 * Registration entry for a manager plugin
 */
export interface ManagerPlugin {
  identifier: string;
  /** Defaults to the identifier */
  displayName?: string;
  info?: InfoDictionary;
  /** Create a new, uninitialized manager instance */
  create(): ManagerInterface;
}

export class ManagerPluginRegistry implements ManagerFactoryInterface {
  private readonly plugins = new Map<string, ManagerPlugin>();

  constructor(private readonly logger: LoggerInterface) {}

  /**
   * Add a plugin. The first registration of an identifier wins; later ones
   * are skipped with a warning.
   *
   * @returns whether the plugin was added
   */
  register(plugin: ManagerPlugin): boolean {
    if (!plugin.identifier) {
      throw new InvalidInputError('Manager plugin identifier must not be empty');
    }

    if (this.plugins.has(plugin.identifier)) {
      this.logger.log(
        'warning',
        `Manager plugin '${plugin.identifier}' is already registered, skipping duplicate`
      );
      return false;
    }

    this.plugins.set(plugin.identifier, plugin);
    this.logger.log('debug', `Registered manager plugin '${plugin.identifier}'`);
    return true;
  }

  managers(): ManagerDetail[] {
    return [...this.plugins.values()].map((plugin) => ({
      identifier: plugin.identifier,
      displayName: plugin.displayName ?? plugin.identifier,
      info: { ...(plugin.info ?? {}) },
    }));
  }

  managerRegistered(identifier: string): boolean {
    return this.plugins.has(identifier);
  }

  /**
   * @throws ManagerError if `identifier` is not registered
   */
  instantiate(identifier: string): ManagerInterface {
    const plugin = this.plugins.get(identifier);
    if (!plugin) {
      throw new ManagerError(`Manager identifier not known: ${identifier}`, identifier);
    }
    return plugin.create();
  }
}
