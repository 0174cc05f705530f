export { Session } from './session.js';
export type { SessionState, UnselectedState, SelectedState, ActiveState } from './session-state.js';
export { splitSessionSettings, mergeSessionSettings } from './settings.js';
export type { SplitSettings } from './settings.js';
export { hostInterfaceSchema, settingsSchema, assertHostInterface, parseSettings } from './validation.js';
