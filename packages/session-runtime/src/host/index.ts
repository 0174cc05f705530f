export { Host } from './host.js';
export { HostSession } from './host-session.js';
