/**
 * @module @asset-session/runtime/config
 *
 * Default manager configuration.
 *
 * A studio can point ASSET_SESSION_DEFAULT_CONFIG at a JSON file naming the
 * manager every host should use, so individual hosts need no setup UI:
 *
 * ```json
 * {
 *   "manager": {
 *     "identifier": "org.example.manager",
 *     "settings": { "library": "${config_dir}/library.json" }
 *   }
 * }
 * ```
 *
 * `${config_dir}` in string settings expands to the absolute directory
 * containing the config file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import {
  ConfigurationError,
  MANAGER_IDENTIFIER_SETTING,
  type HostInterface,
  type LoggerInterface,
  type ManagerFactoryInterface,
  type Settings,
} from '@asset-session/contracts';
import { Session } from '../session/session.js';
import { settingValueSchema } from '../session/validation.js';

export const DEFAULT_CONFIG_ENV_VAR = 'ASSET_SESSION_DEFAULT_CONFIG';

const CONFIG_DIR_TOKEN = '${config_dir}';

export const defaultManagerConfigSchema = z.object({
  manager: z.object({
    identifier: z.string().min(1),
    settings: z.record(settingValueSchema).optional(),
  }),
});

export interface DefaultManagerConfig {
  identifier: string;
  settings: Settings;
}

/**
 * Read and validate a default config file.
 *
 * @throws ConfigurationError if the file is missing, not JSON, or invalid
 */
export function loadDefaultManagerConfig(configPath: string): DefaultManagerConfig {
  const absolutePath = path.resolve(configPath);

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Could not read default manager config '${absolutePath}'`, {
      path: absolutePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Default manager config '${absolutePath}' is not valid JSON`, {
      path: absolutePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const result = defaultManagerConfigSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(`Default manager config '${absolutePath}' is invalid`, {
      path: absolutePath,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const configDir = path.dirname(absolutePath);
  return {
    identifier: result.data.manager.identifier,
    settings: expandConfigDir(result.data.manager.settings ?? {}, configDir),
  };
}

function expandConfigDir(settings: Settings, configDir: string): Settings {
  const expanded: Settings = {};
  for (const [key, value] of Object.entries(settings)) {
    expanded[key] = typeof value === 'string' ? value.split(CONFIG_DIR_TOKEN).join(configDir) : value;
  }
  return expanded;
}

export interface DefaultSessionOptions {
  /** Overrides the environment variable */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build a Session configured from the default config file, if one is set.
 *
 * The manager is selected but, as with `setSettings`, only instantiated on
 * first access.
 *
 * @returns undefined when no config path is provided or set in the environment
 */
export function createDefaultSession(
  hostInterface: HostInterface,
  logger: LoggerInterface,
  managerFactory: ManagerFactoryInterface,
  options: DefaultSessionOptions = {}
): Session | undefined {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env[DEFAULT_CONFIG_ENV_VAR];

  if (!configPath) {
    logger.log('debugApi', `${DEFAULT_CONFIG_ENV_VAR} not set, no default manager configured`);
    return undefined;
  }

  const config = loadDefaultManagerConfig(configPath);
  logger.log('debugApi', `Loaded default manager config for '${config.identifier}' from ${configPath}`);

  const session = new Session(hostInterface, logger, managerFactory);
  session.setSettings({ ...config.settings, [MANAGER_IDENTIFIER_SETTING]: config.identifier });
  return session;
}
