import type { HostAdapter, HostSessionHandle, LoggerInterface } from '@asset-session/contracts';

/**
 * Host and logger, bundled for a manager.
 *
 * A new HostSession is built for every manager initialization. Managers may
 * keep it for as long as the owning Session lives.
 */
export class HostSession implements HostSessionHandle {
  constructor(
    private readonly _host: HostAdapter,
    private readonly _logger: LoggerInterface
  ) {}

  host(): HostAdapter {
    return this._host;
  }

  logger(): LoggerInterface {
    return this._logger;
  }
}
