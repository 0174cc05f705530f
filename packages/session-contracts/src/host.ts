/**
 * Host contracts
 *
 * HostInterface is what a host application implements. Managers never see
 * it directly: they get a HostAdapter through a HostSessionHandle.
 */

import type { InfoDictionary } from './settings.js';
import type { LoggerInterface } from './logger.js';

/**
 * Implemented by the host application
 *
 * @example
 * ```typescript
 * const host: HostInterface = {
 *   identifier: () => 'org.example.editor',
 *   displayName: () => 'Example Editor',
 * };
 * ```
 */
export interface HostInterface {
  /** Unique, reverse-DNS style identifier of the host */
  identifier(): string;
  /** Human readable name, defaults to the identifier */
  displayName?(): string;
  /** Free-form host information */
  info?(): InfoDictionary;
}

/**
 * Host as seen by a manager
 */
export interface HostAdapter {
  identifier(): string;
  displayName(): string;
  info(): InfoDictionary;
}

/**
 * Capability bundle handed to a manager during and after initialization
 */
export interface HostSessionHandle {
  host(): HostAdapter;
  logger(): LoggerInterface;
}
