export { ManagerPluginRegistry } from './plugin-registry.js';
export type { ManagerPlugin } from './plugin-registry.js';
