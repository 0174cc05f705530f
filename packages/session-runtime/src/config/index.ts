export {
  loadDefaultManagerConfig,
  createDefaultSession,
  defaultManagerConfigSchema,
  DEFAULT_CONFIG_ENV_VAR,
} from './default-config.js';
export type { DefaultManagerConfig, DefaultSessionOptions } from './default-config.js';
