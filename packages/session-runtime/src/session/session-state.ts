/**
 * Session state machine
 *
 *   unselected --select--> selected --materialize--> active
 *        ^                    ^  |                     |
 *        |                    |  +--(failure: stays)   |
 *        +------reset---------+-----------select-------+
 *
 * Transitions return new state objects; a state is never mutated.
 */

import type { Settings } from '@asset-session/contracts';
import type { Manager } from '../manager/manager.js';

export interface UnselectedState {
  readonly kind: 'unselected';
}

/** A manager was chosen but not yet instantiated */
export interface SelectedState {
  readonly kind: 'selected';
  readonly identifier: string;
  readonly settings: Readonly<Settings>;
}

/** A manager was instantiated and initialized */
export interface ActiveState {
  readonly kind: 'active';
  readonly identifier: string;
  readonly manager: Manager;
}

export type SessionState = UnselectedState | SelectedState | ActiveState;

export const UNSELECTED: UnselectedState = { kind: 'unselected' };

export function selectManager(identifier: string, settings: Settings = {}): SelectedState {
  return { kind: 'selected', identifier, settings: { ...settings } };
}

/**
 * Move a selected state to active by running `materialize` once.
 *
 * If `materialize` throws, the error propagates and the caller keeps the
 * selected state, so the next attempt retries from scratch.
 */
export function activate(
  state: SelectedState,
  materialize: (identifier: string, settings: Settings) => Manager
): ActiveState {
  const manager = materialize(state.identifier, { ...state.settings });
  return { kind: 'active', identifier: state.identifier, manager };
}
