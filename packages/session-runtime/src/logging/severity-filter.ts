import {
  SEVERITY_NAMES,
  isSeverity,
  severityRank,
  type LoggerInterface,
  type Severity,
} from '@asset-session/contracts';

export const LOGGING_SEVERITY_ENV_VAR = 'ASSET_SESSION_LOGGING_SEVERITY';

const DEFAULT_SEVERITY: Severity = 'warning';

/**
 * Parse a severity given by name ("debug") or by index ("1").
 */
export function parseSeverity(value: string): Severity | undefined {
  const trimmed = value.trim();
  if (isSeverity(trimmed)) {
    return trimmed;
  }
  if (/^\d+$/.test(trimmed)) {
    return SEVERITY_NAMES[Number(trimmed)];
  }
  return undefined;
}

export interface SeverityFilterOptions {
  /** Overrides the environment */
  severity?: Severity;
  env?: NodeJS.ProcessEnv;
}

/**
 * Forwards messages at or above a minimum severity to an upstream logger.
 *
 * The initial minimum comes from `options.severity`, then
 * ASSET_SESSION_LOGGING_SEVERITY, then `warning`.
 */
export class SeverityFilter implements LoggerInterface {
  private severity: Severity;

  constructor(
    private readonly upstream: LoggerInterface,
    options: SeverityFilterOptions = {}
  ) {
    this.severity = options.severity ?? this.severityFromEnv(options.env ?? process.env);
  }

  log(severity: Severity, message: string): void {
    if (!this.isSeverityLogged(severity)) {
      return;
    }
    this.upstream.log(severity, message);
  }

  setSeverity(severity: Severity): void {
    this.severity = severity;
  }

  getSeverity(): Severity {
    return this.severity;
  }

  isSeverityLogged(severity: Severity): boolean {
    return severityRank(severity) >= severityRank(this.severity);
  }

  upstreamLogger(): LoggerInterface {
    return this.upstream;
  }

  private severityFromEnv(env: NodeJS.ProcessEnv): Severity {
    const raw = env[LOGGING_SEVERITY_ENV_VAR];
    if (raw === undefined || raw === '') {
      return DEFAULT_SEVERITY;
    }

    const parsed = parseSeverity(raw);
    if (!parsed) {
      this.upstream.log(
        'warning',
        `${LOGGING_SEVERITY_ENV_VAR} set to invalid value '${raw}', using '${DEFAULT_SEVERITY}'`
      );
      return DEFAULT_SEVERITY;
    }
    return parsed;
  }
}
