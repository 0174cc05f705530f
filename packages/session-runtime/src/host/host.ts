/**
 * Host adapter
 *
 * Thin pass-through over the host-supplied HostInterface, filling in the
 * optional accessors.
 */

import type { HostAdapter, HostInterface, InfoDictionary } from '@asset-session/contracts';

export class Host implements HostAdapter {
  constructor(private readonly _hostInterface: HostInterface) {}

  identifier(): string {
    return this._hostInterface.identifier();
  }

  displayName(): string {
    return this._hostInterface.displayName?.() ?? this._hostInterface.identifier();
  }

  info(): InfoDictionary {
    return this._hostInterface.info?.() ?? {};
  }

  /** @internal */
  hostInterface(): HostInterface {
    return this._hostInterface;
  }
}
