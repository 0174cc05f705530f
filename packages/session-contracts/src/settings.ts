/**
 * @module @asset-session/contracts/settings
 * Settings and info mappings exchanged between hosts and managers
 */

/**
 * Primitive value allowed in settings and info mappings
 */
export type SettingValue = string | number | boolean | null;

/**
 * Manager settings, as persisted by a host and handed to a manager
 */
export type Settings = Record<string, SettingValue>;

/**
 * Descriptive key/value data reported by hosts and managers
 */
export type InfoDictionary = Record<string, SettingValue>;

/**
 * Terminology overrides, keyed by term
 */
export type StringMap = Record<string, string>;

/**
 * Reserved key naming the manager a settings mapping belongs to.
 *
 * Session-level metadata: never forwarded to the manager itself.
 */
export const MANAGER_IDENTIFIER_SETTING = 'identifier';

/**
 * Info key a manager may use to declare the prefix shared by all of its
 * entity references.
 */
export const INFO_KEY_ENTITY_REFERENCES_MATCH_PREFIX = 'entityReferencesMatchPrefix';
