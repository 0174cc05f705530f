export { Manager } from './manager.js';
