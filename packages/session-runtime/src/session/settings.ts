import { MANAGER_IDENTIFIER_SETTING, type Settings, type SettingValue } from '@asset-session/contracts';

export interface SplitSettings {
  /** Value stored under the reserved key, undefined if absent */
  identifier: SettingValue | undefined;
  managerSettings: Settings;
}

/**
 * Separate the reserved manager identifier from manager-specific settings.
 */
export function splitSessionSettings(allSettings: Settings): SplitSettings {
  const { [MANAGER_IDENTIFIER_SETTING]: identifier, ...managerSettings } = allSettings;
  return { identifier, managerSettings };
}

/**
 * Manager settings plus the reserved identifier key. The reserved key
 * always wins over a same-named manager setting.
 */
export function mergeSessionSettings(identifier: string | null, managerSettings: Settings = {}): Settings {
  return { ...managerSettings, [MANAGER_IDENTIFIER_SETTING]: identifier };
}
