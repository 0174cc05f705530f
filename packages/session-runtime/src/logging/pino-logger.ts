/**
 * @fileoverview LoggerInterface backed by pino
 *
 * Maps session severities onto pino levels and writes structured JSON:
 *
 *   debugApi -> trace    warning  -> warn
 *   debug    -> debug    error    -> error
 *   info     -> info     critical -> fatal
 *   progress -> info (with `progress: true`)
 */

import { pino, type DestinationStream, type Level, type Logger as PinoInstance } from 'pino';
import type { LoggerInterface, Severity } from '@asset-session/contracts';

export interface PinoLoggerOptions {
  level?: Level;
  name?: string;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

const PINO_LEVELS: Record<Severity, Level> = {
  debugApi: 'trace',
  debug: 'debug',
  info: 'info',
  progress: 'info',
  warning: 'warn',
  error: 'error',
  critical: 'fatal',
};

const VALID_LEVELS: readonly Level[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function levelFromEnv(): Level | undefined {
  const raw = process.env.LOG_LEVEL;
  return VALID_LEVELS.find((level) => level === raw);
}

export class PinoLogger implements LoggerInterface {
  constructor(private readonly _pino: PinoInstance) {}

  log(severity: Severity, message: string): void {
    const fields = severity === 'progress' ? { severity, progress: true } : { severity };
    this._pino[PINO_LEVELS[severity]](fields, message);
  }

  /**
   * Underlying pino instance, e.g. to create child loggers
   */
  pino(): PinoInstance {
    return this._pino;
  }
}

/**
 * Create a pino-backed LoggerInterface.
 *
 * Level comes from `options.level`, then `LOG_LEVEL`, then `info`.
 */
export function createPinoLogger(options: PinoLoggerOptions = {}): PinoLogger {
  const pinoOptions = {
    level: options.level ?? levelFromEnv() ?? 'info',
    name: options.name ?? 'asset-session',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  const instance = options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
  return new PinoLogger(instance);
}
